/**
 * Builtin Command Registry
 */

import type { BuiltinCommand } from '../../engine/command.js';
import { EngineState } from '../../engine/engine-state.js';
import { StateWorkingSet } from '../../engine/working-set.js';
import { CONVERSION_COMMANDS } from './conversions.js';
import { CORE_COMMANDS } from './core.js';
import { FILTER_COMMANDS } from './filters.js';
import { FORMAT_COMMANDS } from './formats.js';
import { HASH_COMMANDS } from './hash.js';
import { MATH_COMMANDS } from './math.js';
import { NETWORK_COMMANDS } from './network.js';
import { PLATFORM_COMMANDS } from './platform.js';
import { STRING_COMMANDS } from './strings.js';

export const BUILTIN_COMMANDS: readonly BuiltinCommand[] = [
  ...CORE_COMMANDS,
  ...FILTER_COMMANDS,
  ...STRING_COMMANDS,
  ...PLATFORM_COMMANDS,
  ...CONVERSION_COMMANDS,
  ...FORMAT_COMMANDS,
  ...NETWORK_COMMANDS,
  ...HASH_COMMANDS,
  ...MATH_COMMANDS,
];

/**
 * Engine state with `commands` declared in its root scope.
 * Later declarations with the same name shadow earlier ones.
 */
export function createEngineState(
  commands: readonly BuiltinCommand[] = BUILTIN_COMMANDS
): EngineState {
  const engine = new EngineState();
  const workingSet = new StateWorkingSet(engine);
  for (const command of commands) workingSet.addDecl(command);
  engine.mergeDelta(workingSet.render());
  return engine;
}
