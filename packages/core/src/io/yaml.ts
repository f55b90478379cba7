import { stringify } from 'yaml';

export interface YamlSerializeOptions {
  /** Must match the indent presentation containers were built with */
  indent?: number;
}

/**
 * Block-style YAML. Comments and flow marks carried by `yaml` nodes in the
 * tree are honoured.
 */
export function serializeYaml(
  value: unknown,
  options: YamlSerializeOptions = {}
): string {
  return stringify(value, { indent: options.indent ?? 2 });
}
