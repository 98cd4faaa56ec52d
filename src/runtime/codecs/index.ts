export type { Codec } from './types.js';
export { fromIni } from './ini.js';
export { fromJson } from './json.js';
export { fromToml } from './toml.js';
export { fromUrl } from './url.js';
export { fromYaml } from './yaml.js';
