/**
 * YAML serialization for manifests and Compose files
 * Generates YAML strings from typed resource records
 */

/**
 * Serialize a record to YAML with proper indentation.
 * `undefined` fields are skipped; multi-line strings become block literals.
 */
export function toYaml(obj: object, indent = 0): string {
  const lines: string[] = [];
  const prefix = '  '.repeat(indent);

  for (const [key, value] of entriesOf(obj)) {
    if (value === undefined) continue;
    const label = `${prefix}${formatYamlKey(key)}:`;

    if (value === null) {
      lines.push(`${label} null`);
    } else if (typeof value === 'string') {
      if (value.includes('\n')) {
        lines.push(...formatBlockLiteral(label, value, prefix + '  '));
      } else {
        lines.push(`${label} ${formatYamlString(value)}`);
      }
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      lines.push(`${label} ${value}`);
    } else if (Array.isArray(value)) {
      if (value.length === 0) {
        lines.push(`${label} []`);
      } else {
        lines.push(label);
        lines.push(...formatSequence(value, prefix));
      }
    } else if (typeof value === 'object') {
      if (isEmptyRecord(value)) {
        lines.push(`${label} {}`);
      } else {
        lines.push(label);
        lines.push(toYaml(value, indent + 1));
      }
    }
  }

  return lines.join('\n');
}

function entriesOf(obj: object): Array<[string, unknown]> {
  return Object.entries(obj);
}

function isEmptyRecord(obj: object): boolean {
  return entriesOf(obj).every(([, value]) => value === undefined);
}

function isRecord(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatSequence(items: unknown[], prefix: string): string[] {
  const lines: string[] = [];

  for (const item of items) {
    if (item === undefined) continue;

    if (isRecord(item) && !isEmptyRecord(item)) {
      const itemLines = toYaml(item, 0).split('\n');
      lines.push(`${prefix}- ${itemLines[0]}`);
      for (let i = 1; i < itemLines.length; i++) {
        lines.push(itemLines[i] === '' ? '' : `${prefix}  ${itemLines[i]}`);
      }
    } else {
      lines.push(`${prefix}- ${formatYamlValue(item)}`);
    }
  }

  return lines;
}

/**
 * Literal block scalar. Chomping keeps the exact trailing newlines.
 */
function formatBlockLiteral(label: string, value: string, contentPrefix: string): string[] {
  let body = value;
  let chomping = '-';

  if (body.endsWith('\n')) {
    body = body.slice(0, -1);
    chomping = body.endsWith('\n') ? '+' : '';
  }

  // Leading spaces would be read as indentation without an explicit indicator
  const indentation = body.startsWith(' ') ? '2' : '';
  const lines = [`${label} |${indentation}${chomping}`];

  for (const line of body.split('\n')) {
    lines.push(line === '' ? '' : `${contentPrefix}${line}`);
  }

  return lines;
}

function formatYamlKey(key: string): string {
  return /^[A-Za-z_][A-Za-z0-9_./-]*$/.test(key) ? key : quote(key);
}

/**
 * Format a string value for YAML, adding quotes if needed
 */
export function formatYamlString(value: string): string {
  const needsQuotes =
    value === '' ||
    value === '-' ||
    value.includes(':') ||
    value.includes('#') ||
    value.includes('\n') ||
    value.includes('\t') ||
    value.includes('"') ||
    value.includes("'") ||
    value.startsWith(' ') ||
    value.endsWith(' ') ||
    value.startsWith('- ') ||
    /^[*&!{}[\]@`%|>?,]/.test(value) ||
    /^(true|false|yes|no|on|off|null|~)$/i.test(value) ||
    /^[-+.]?\d/.test(value);

  return needsQuotes ? quote(value) : value;
}

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

/**
 * Format any value for inline YAML
 */
function formatYamlValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return formatYamlString(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    return `[${value.map(formatYamlValue).join(', ')}]`;
  }
  if (isRecord(value)) {
    const pairs = entriesOf(value)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${formatYamlKey(k)}: ${formatYamlValue(v)}`);
    return `{${pairs.join(', ')}}`;
  }
  return 'null';
}

/**
 * Generate a YAML document with header comment
 */
export function generateYamlDocument(resource: object, comment?: string): string {
  const lines: string[] = [];

  if (comment) {
    for (const line of comment.split('\n')) {
      lines.push(line ? `# ${line}` : '#');
    }
    lines.push('');
  }

  lines.push(toYaml(resource));

  return lines.join('\n') + '\n';
}
