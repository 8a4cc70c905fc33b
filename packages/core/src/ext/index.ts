/**
 * Built-in Extensions
 */

import type { Extension } from '../extensions.js';
import { doExtension } from './do/index.js';
import { loopControlsExtension } from './loop-controls/index.js';

export { doExtension, loopControlsExtension };

/** Built-in extensions by name, for configuration files */
export const BUILTIN_EXTENSIONS: ReadonlyMap<string, Extension> = new Map([
  [doExtension.name, doExtension],
  [loopControlsExtension.name, loopControlsExtension],
]);
