import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { toYaml, formatYamlString, generateYamlDocument } from '../generators/format/yaml';

describe('toYaml', () => {
  it('should serialize scalars', () => {
    expect(toYaml({ a: 'x', b: 1, c: true, d: null })).toBe('a: x\nb: 1\nc: true\nd: null');
  });

  it('should quote strings that would be misread', () => {
    expect(toYaml({ port: '9000:9000', version: '3.8', flag: 'yes', empty: '' })).toBe(
      'port: "9000:9000"\nversion: "3.8"\nflag: "yes"\nempty: ""'
    );
  });

  it('should nest maps and sequences', () => {
    const yaml = toYaml({
      metadata: { name: 'minio', labels: { app: 'minio' } },
      args: ['server', '/data'],
    });

    expect(yaml).toBe(
      ['metadata:', '  name: minio', '  labels:', '    app: minio', 'args:', '- server', '- /data'].join('\n')
    );
  });

  it('should write sequences of maps', () => {
    const yaml = toYaml({
      ports: [
        { name: 'api', port: 9000 },
        { name: 'console', port: 9001 },
      ],
    });

    expect(yaml).toBe('ports:\n- name: api\n  port: 9000\n- name: console\n  port: 9001');
  });

  it('should skip undefined fields and write empty collections inline', () => {
    expect(toYaml({ a: {}, b: [], c: undefined, d: { e: undefined } })).toBe('a: {}\nb: []\nd: {}');
  });

  it('should write multi-line strings as literal blocks', () => {
    const yaml = toYaml({ data: { 'config.properties': 'a=1\nb=2\n' } });

    expect(yaml).toBe('data:\n  config.properties: |\n    a=1\n    b=2');
  });

  it('should strip the final newline when the value has none', () => {
    expect(toYaml({ s: 'a\nb' })).toBe('s: |-\n  a\n  b');
  });

  it('should add an indentation indicator for leading spaces', () => {
    const yaml = toYaml({ s: '  indented\nline' });

    expect(yaml).toBe('s: |2-\n    indented\n  line');
    expect(parse(yaml)).toEqual({ s: '  indented\nline' });
  });

  it('should quote keys that are not plain identifiers', () => {
    expect(toYaml({ 'app.kubernetes.io/name': 'x', 'with space': 'y' })).toBe(
      'app.kubernetes.io/name: x\n"with space": y'
    );
  });

  it('should keep tricky values intact through a parser', () => {
    const value = {
      words: ['yes', 'off', '3.8', '-XX:+UseG1GC', 'a: b', '#x', '- x', '', '*ref', 'say "hi"'],
      block: 'first\n\nthird\n',
      kept: 'trailing\n\n',
      nested: [{ name: 'x', command: ['a', 'b'], script: 'line1\nline2' }],
      flow: [['CMD', 'curl']],
    };

    expect(parse(generateYamlDocument(value))).toEqual(value);
  });
});

describe('formatYamlString', () => {
  it('should quote only when a plain scalar would be misread', () => {
    expect(formatYamlString('minio/minio:latest')).toBe('"minio/minio:latest"');
    expect(formatYamlString('trino-production')).toBe('trino-production');
    expect(formatYamlString('-server')).toBe('-server');
  });

  it('should escape quotes and control characters', () => {
    expect(formatYamlString('say "hi"')).toBe('"say \\"hi\\""');
    expect(formatYamlString('tab\there')).toBe('"tab\\there"');
    expect(formatYamlString('back\\slash:')).toBe('"back\\\\slash:"');
  });
});

describe('generateYamlDocument', () => {
  it('should prefix a header comment', () => {
    expect(generateYamlDocument({ a: 1 }, 'Header\n\nMore')).toBe('# Header\n#\n# More\n\na: 1\n');
  });

  it('should end with a newline without a header', () => {
    expect(generateYamlDocument({ a: 1 })).toBe('a: 1\n');
  });
});
