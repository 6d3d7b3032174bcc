import { describe, it, expect } from 'vitest';
import { toProperties, toJvmConfig } from '../generators/format/properties';

describe('toProperties', () => {
  it('should write key=value lines in insertion order', () => {
    const content = toProperties({
      coordinator: true,
      'http-server.http.port': 8080,
      'discovery.uri': 'http://localhost:8080',
    });

    expect(content).toBe('coordinator=true\nhttp-server.http.port=8080\ndiscovery.uri=http://localhost:8080\n');
  });

  it('should escape separators in keys and special characters in values', () => {
    const content = toProperties({
      'key with space': 'a\\b',
      multi: 'x\ny',
      lead: ' v',
    });

    expect(content).toBe('key\\ with\\ space=a\\\\b\nmulti=x\\ny\nlead=\\ v\n');
  });

  it('should not escape colons in values', () => {
    expect(toProperties({ 's3.endpoint': 'http://minio:9000' })).toBe('s3.endpoint=http://minio:9000\n');
  });
});

describe('toJvmConfig', () => {
  it('should write one option per line', () => {
    expect(toJvmConfig(['-server', '-Xmx2G'])).toBe('-server\n-Xmx2G\n');
  });

  it('should reject multi-line options', () => {
    expect(() => toJvmConfig(['-server\n-Xmx2G'])).toThrow(/single line/);
  });
});
