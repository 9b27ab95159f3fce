export { serializeResourcesToYaml, type YamlSerializationOptions } from './yaml.js';
