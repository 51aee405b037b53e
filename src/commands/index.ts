export { setCommand, addKeyCommand, removeKeyCommand } from './keyval.js';
export { pidFileCommand, pidCommand } from './pid.js';
export { getConfigCommand, setConfigCommand } from './ftl-config.js';
export { statusCommand } from './status.js';
export { initCommand } from './init.js';
