export { parseConfigText } from './parse.js';
export { extendedReplacer, serializeJson } from './json.js';
export { serializeYaml, type YamlSerializeOptions } from './yaml.js';
