/**
 * Name Resolution
 *
 * Lowers a syntax tree into the id-based block graph through a working set.
 * Every command, variable and module name is looked up exactly once here;
 * evaluation only ever sees ids.
 */

import {
  createError,
  typeMismatch,
  unknownCommand,
  variableNotDefined,
} from '../error-classes.js';
import { SHELL_ERROR_CODES } from '../error-registry.js';
import {
  paramTypeAt,
  type CommandFlag,
  type CommandParam,
  type ParamType,
} from '../engine/command.js';
import { Module } from '../engine/module.js';
import type { StateWorkingSet } from '../engine/working-set.js';
import { didYouMean } from '../runtime/core/suggest.js';
import type {
  BlockId,
  BlockParam,
  BlockSignature,
  CallExpr,
  DeclId,
  Expression,
  ImportPattern,
  ImportPatternMember,
  NamedArg,
  Pipeline,
  Span,
  VarId,
} from '../types.js';
import type {
  BlockNode,
  CallNode,
  FlagNode,
  ImportPatternNode,
  ParamNode,
  PipelineNode,
  Program,
  SyntaxNode,
} from './syntax.js';

/** Variables declared in, and captured by, one block being resolved */
interface BlockContext {
  readonly declared: Set<VarId>;
  readonly captures: Set<VarId>;
}

/** Name bound to a parameterless closure */
const IMPLICIT_PARAM = 'it';

function isFlag(arg: SyntaxNode | FlagNode): arg is FlagNode {
  return arg.kind === 'flag';
}

function toImportPattern(node: ImportPatternNode): ImportPattern {
  const members = node.members.map((member): ImportPatternMember => {
    switch (member.kind) {
      case 'glob':
        return { type: 'glob', span: member.span };
      case 'name':
        return { type: 'name', name: member.name, span: member.span };
      case 'list':
        return { type: 'list', names: member.names };
    }
  });
  return {
    head: { name: node.head, span: node.headSpan },
    members,
    moduleId: null,
    hidden: new Set(),
  };
}

export class Resolver {
  private readonly contexts: BlockContext[] = [];
  private currentModule: Module | null = null;

  constructor(private readonly workingSet: StateWorkingSet) {}

  /**
   * Resolve a whole program into a top-level block.
   * Top-level names are declared in the working set's root frame so they
   * persist once the delta is merged.
   *
   * @throws ShellError on any resolve-time failure; nothing is evaluated
   */
  resolveProgram(program: Program): BlockId {
    const context = this.pushContext();
    const pipelines = program.pipelines.map((p) => this.resolvePipeline(p));
    this.workingSet.finalize();
    this.contexts.pop();

    return this.workingSet.addBlock({
      signature: { positional: [], rest: null, flags: [] },
      pipelines,
      captures: [...context.captures],
      span: program.span,
    });
  }

  // ============================================================
  // CONTEXTS
  // ============================================================

  private pushContext(): BlockContext {
    const context: BlockContext = { declared: new Set(), captures: new Set() };
    this.contexts.push(context);
    return context;
  }

  private declareVariable(name: string, span: Span): VarId {
    const id = this.workingSet.addVariable(name, span);
    this.contexts[this.contexts.length - 1]?.declared.add(id);
    return id;
  }

  /** Record `id` as captured by every enclosing block that did not declare it */
  private noteCapture(id: VarId): void {
    for (let i = this.contexts.length - 1; i >= 0; i--) {
      const context = this.contexts[i];
      if (context === undefined || context.declared.has(id)) return;
      context.captures.add(id);
    }
  }

  // ============================================================
  // BLOCKS
  // ============================================================

  private resolvePipeline(node: PipelineNode): Pipeline {
    return {
      elements: node.elements.map((element) => this.resolveExpression(element)),
    };
  }

  /**
   * Resolve a block in its own scope.
   * Names declared inside are dropped when the scope closes.
   */
  private resolveBlock(
    span: Span,
    params: readonly ParamNode[],
    body: readonly PipelineNode[]
  ): BlockId {
    this.workingSet.enterScope();
    const context = this.pushContext();

    const signature = this.declareParams(params);
    const pipelines = body.map((p) => this.resolvePipeline(p));

    this.workingSet.exitScope();
    this.contexts.pop();

    return this.workingSet.addBlock({
      signature,
      pipelines,
      captures: [...context.captures],
      span,
    });
  }

  private declareParams(params: readonly ParamNode[]): BlockSignature {
    const positional: BlockParam[] = [];
    const flags: BlockParam[] = [];
    let rest: BlockParam | null = null;

    for (const param of params) {
      const resolved: BlockParam = {
        name: param.name,
        varId: this.declareVariable(param.name, param.span),
        optional: param.optional ?? false,
      };
      if (param.flag) flags.push(resolved);
      else if (param.rest) rest = resolved;
      else positional.push(resolved);
    }

    return { positional, rest, flags };
  }

  private blockParams(node: BlockNode, closure: boolean): ParamNode[] {
    if (node.params !== null) return [...node.params];
    return closure ? [{ name: IMPLICIT_PARAM, span: node.span }] : [];
  }

  // ============================================================
  // EXPRESSIONS
  // ============================================================

  private resolveExpression(
    node: SyntaxNode,
    expected: ParamType = 'any'
  ): Expression {
    const span = node.span;
    switch (node.kind) {
      case 'nothing':
        return { type: 'Nothing', span };
      case 'bool':
        return { type: 'Bool', val: node.val, span };
      case 'int':
        return { type: 'Int', val: node.val, span };
      case 'float':
        return { type: 'Float', val: node.val, span };
      case 'string':
        return { type: 'String', val: node.val, span };
      case 'list':
        return {
          type: 'List',
          items: node.items.map((item) => this.resolveExpression(item)),
          span,
        };
      case 'record':
        return {
          type: 'Record',
          fields: node.fields.map(
            ([name, value]) => [name, this.resolveExpression(value)] as const
          ),
          span,
        };
      case 'table':
        return {
          type: 'Table',
          columns: node.columns,
          rows: node.rows.map((row) =>
            row.map((cell) => this.resolveExpression(cell))
          ),
          span,
        };
      case 'range':
        return {
          type: 'Range',
          from: node.from ? this.resolveExpression(node.from) : null,
          next: node.next ? this.resolveExpression(node.next) : null,
          to: node.to ? this.resolveExpression(node.to) : null,
          inclusion: node.inclusion,
          span,
        };
      case 'var':
        return { type: 'Var', varId: this.resolveVariable(node.name, span), span };
      case 'varDecl':
        throw typeMismatch('variable declaration outside of let', span);
      case 'env':
        return { type: 'EnvVar', key: node.key, span };
      case 'binary':
        return {
          type: 'BinaryOp',
          op: node.op,
          opSpan: node.opSpan,
          lhs: this.resolveExpression(node.lhs),
          rhs: this.resolveExpression(node.rhs),
          span,
        };
      case 'path':
        return {
          type: 'FullCellPath',
          head: this.resolveExpression(node.head),
          tail: node.tail,
          span,
        };
      case 'cellPath':
        return { type: 'CellPath', path: { members: node.members }, span };
      case 'block':
        return {
          type: 'Block',
          blockId: this.resolveBlock(
            span,
            this.blockParams(node, expected === 'closure'),
            node.body
          ),
          span,
        };
      case 'rowCondition':
        return {
          type: 'RowCondition',
          blockId: this.resolveBlock(
            span,
            [{ name: IMPLICIT_PARAM, span }],
            [{ elements: [node.condition] }]
          ),
          span,
        };
      case 'subexpression':
        return {
          type: 'Subexpression',
          blockId: this.resolveBlock(span, [], node.body),
          span,
        };
      case 'importPattern':
        throw typeMismatch('import pattern outside of use or hide', span);
      case 'call':
        return this.resolveCall(node);
    }
  }

  private resolveVariable(name: string, span: Span): VarId {
    const id = this.workingSet.findVariable(name);
    if (id === undefined) {
      throw variableNotDefined(
        name,
        span,
        didYouMean(this.workingSet.variableNames(), name)
      );
    }
    this.noteCapture(id);
    return id;
  }

  // ============================================================
  // CALLS
  // ============================================================

  private findCommand(node: CallNode): DeclId {
    const declId = this.workingSet.findDecl(node.name);
    if (declId === undefined) {
      throw unknownCommand(
        node.name,
        node.head,
        didYouMean(this.workingSet.declNames(), node.name)
      );
    }
    return declId;
  }

  private call(
    node: CallNode,
    declId: DeclId,
    positional: Expression[],
    named: NamedArg[] = []
  ): CallExpr {
    return {
      type: 'Call',
      declId,
      head: node.head,
      positional,
      named,
      span: node.span,
    };
  }

  private resolveCall(node: CallNode): CallExpr {
    switch (node.name) {
      case 'let':
        return this.resolveLet(node);
      case 'def':
      case 'export def':
        return this.resolveDef(node);
      case 'export env':
        return this.resolveExportEnv(node);
      case 'module':
        return this.resolveModule(node);
      case 'use':
        return this.resolveUse(node);
      case 'hide':
        return this.resolveHide(node);
      default:
        return this.resolveCommandCall(node);
    }
  }

  private resolveCommandCall(node: CallNode): CallExpr {
    const declId = this.findCommand(node);
    const signature = this.workingSet.getDecl(declId).signature;

    const positional: Expression[] = [];
    const named: NamedArg[] = [];
    for (const arg of node.args) {
      if (isFlag(arg)) {
        // Short forms are stored under the flag's long name
        const long = signature.flags.find((flag) => flag.short === arg.name);
        named.push({
          name: long?.name ?? arg.name,
          value: arg.value ? this.resolveExpression(arg.value) : null,
          span: arg.span,
        });
        continue;
      }
      const expected = paramTypeAt(signature, positional.length) ?? 'any';
      positional.push(this.resolveExpression(arg, expected));
    }

    return this.call(node, declId, positional, named);
  }

  /** Positional argument `index`, or a type mismatch naming what was expected */
  private arg<K extends SyntaxNode['kind']>(
    node: CallNode,
    index: number,
    kind: K
  ): Extract<SyntaxNode, { kind: K }> {
    const arg = node.args[index];
    if (arg !== undefined && !isFlag(arg) && isKind(arg, kind)) return arg;
    throw typeMismatch(
      `${node.name} expects a ${kind} as argument ${index + 1}`,
      arg?.span ?? node.head
    );
  }

  /** `let name = value`: the value is resolved before the name exists */
  private resolveLet(node: CallNode): CallExpr {
    const declId = this.findCommand(node);
    const target = this.arg(node, 0, 'varDecl');
    const valueNode = node.args[1];
    if (valueNode === undefined || isFlag(valueNode)) {
      throw createError(
        SHELL_ERROR_CODES.MISSING_PARAMETER,
        { name: 'value' },
        [node.head]
      );
    }
    const value = this.resolveExpression(valueNode);
    const varId = this.declareVariable(target.name, target.span);
    return this.call(node, declId, [
      { type: 'VarDecl', varId, span: target.span },
      value,
    ]);
  }

  /** `def name [params] { body }`, declared before the body so it may recurse */
  private resolveDef(node: CallNode): CallExpr {
    const declId = this.findCommand(node);
    const name = this.arg(node, 0, 'string');
    const body = this.arg(node, 1, 'block');
    const params = body.params ?? [];

    const customId = this.workingSet.declareCustom(
      name.val,
      {
        params: params
          .filter((param) => !param.flag)
          .map(
            (param): CommandParam => ({
              name: param.name,
              type: 'any',
              description: '',
              optional: param.optional,
              rest: param.rest,
            })
          ),
        flags: params
          .filter((param) => param.flag)
          .map(
            (param): CommandFlag => ({
              name: param.name,
              type: 'any',
              description: '',
            })
          ),
      },
      '',
      name.span
    );

    const blockId = this.resolveBlock(body.span, params, body.body);
    this.workingSet.setDeclBlock(customId, blockId);

    if (node.name === 'export def' && this.currentModule) {
      this.currentModule.addDecl(name.val, customId);
    }

    return this.call(node, declId, [
      { type: 'String', val: name.val, span: name.span },
      { type: 'Block', blockId, span: body.span },
    ]);
  }

  /** `export env name { value }` inside a module body */
  private resolveExportEnv(node: CallNode): CallExpr {
    const declId = this.findCommand(node);
    const name = this.arg(node, 0, 'string');
    const body = this.arg(node, 1, 'block');
    if (this.currentModule === null) {
      throw typeMismatch('export env is only allowed inside a module', node.head);
    }

    const blockId = this.resolveBlock(body.span, [], body.body);
    this.currentModule.addEnvVar(name.val, blockId);

    return this.call(node, declId, [
      { type: 'String', val: name.val, span: name.span },
      { type: 'Block', blockId, span: body.span },
    ]);
  }

  /** `module name { defs }`: the body is resolved in its own scope */
  private resolveModule(node: CallNode): CallExpr {
    const declId = this.findCommand(node);
    const name = this.arg(node, 0, 'string');
    const body = this.arg(node, 1, 'block');

    const module = new Module(name.val, name.span);
    const enclosing = this.currentModule;
    this.currentModule = module;
    try {
      this.resolveBlock(body.span, [], body.body);
    } finally {
      this.currentModule = enclosing;
    }
    this.workingSet.addModule(name.val, module);

    return this.call(node, declId, [
      { type: 'String', val: name.val, span: name.span },
    ]);
  }

  private resolveUse(node: CallNode): CallExpr {
    const declId = this.findCommand(node);
    const patternNode = this.arg(node, 0, 'importPattern');
    const { pattern } = this.workingSet.usePattern(toImportPattern(patternNode));
    return this.call(node, declId, [
      { type: 'ImportPattern', pattern, span: patternNode.span },
    ]);
  }

  private resolveHide(node: CallNode): CallExpr {
    const declId = this.findCommand(node);
    const patternNode = this.arg(node, 0, 'importPattern');
    const pattern = this.workingSet.hidePattern(toImportPattern(patternNode));
    return this.call(node, declId, [
      { type: 'ImportPattern', pattern, span: patternNode.span },
    ]);
  }
}

function isKind<K extends SyntaxNode['kind']>(
  node: SyntaxNode,
  kind: K
): node is Extract<SyntaxNode, { kind: K }> {
  return node.kind === kind;
}
