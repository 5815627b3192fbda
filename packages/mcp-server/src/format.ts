import YAML from 'yaml';

/** Block-style YAML for tool output. Long scalars stay on one line. */
export function toYaml(value: unknown): string {
  return YAML.stringify(value ?? null, { lineWidth: 0 });
}
