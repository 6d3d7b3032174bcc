/**
 * Java properties and JVM option file serialization
 */

export type PropertyValue = string | number | boolean;

/**
 * Serialize ordered key/value pairs as a `.properties` file.
 * Keys keep insertion order; one `key=value` per line.
 */
export function toProperties(entries: Record<string, PropertyValue>): string {
  const lines = Object.entries(entries).map(
    ([key, value]) => `${escapePropertyKey(key)}=${escapePropertyValue(String(value))}`
  );
  return lines.join('\n') + '\n';
}

function escapeCommon(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

export function escapePropertyKey(key: string): string {
  return escapeCommon(key).replace(/([=: #!])/g, '\\$1');
}

export function escapePropertyValue(value: string): string {
  // Only a leading space is significant on the value side
  return escapeCommon(value).replace(/^ /, '\\ ');
}

/**
 * One JVM option per line, in the given order
 */
export function toJvmConfig(options: readonly string[]): string {
  for (const option of options) {
    if (option.includes('\n')) {
      throw new Error(`JVM option must be a single line: ${JSON.stringify(option)}`);
    }
  }
  return options.join('\n') + '\n';
}
