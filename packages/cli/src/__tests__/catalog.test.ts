import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import {
  MissingRequiredFieldError,
  UnknownArtifactKindError,
  envCredentials,
  resolveConfig,
  staticCredentials,
} from '@lakestack/blueprint';
import { BASE_RESOURCES, artifactCategory, createTemplateCatalog } from '../generators/catalog';
import type { ArtifactKind } from '../generators/types';

const credentials = staticCredentials({ accessKey: 'test-access', secretKey: 'test-secret' });
const catalog = createTemplateCatalog(credentials);
const composeConfig = resolveConfig({});
const kustomizeConfig = resolveConfig({ mode: 'kustomize', namespace: 'trino-production' });

function renderKustomize(kind: ArtifactKind, overlay?: string): string {
  return catalog.render(kind, 'kustomize', kustomizeConfig, overlay ? { overlay } : undefined);
}

// ============================================================================
// Catalog lookup
// ============================================================================

describe('createTemplateCatalog', () => {
  it('should list compose kinds', () => {
    expect(catalog.kinds('compose')).toEqual([
      'trino-jvm-config',
      'trino-server-config',
      'trino-node-config',
      'trino-log-config',
      'trino-catalog-config',
      'compose-file',
    ]);
  });

  it('should not offer standalone node and log configs in kustomize mode', () => {
    expect(catalog.has('trino-node-config', 'kustomize')).toBe(false);
    expect(catalog.has('trino-log-config', 'kustomize')).toBe(false);
    expect(catalog.has('trino-server-config', 'kustomize')).toBe(true);
  });

  it('should throw UnknownArtifactKindError for a kind outside the mode', () => {
    expect(() => catalog.render('minio-deployment', 'compose', composeConfig)).toThrow(UnknownArtifactKindError);
    expect(() => catalog.render('compose-file', 'kustomize', kustomizeConfig)).toThrow(UnknownArtifactKindError);
  });

  it('should throw UnknownArtifactKindError for an unknown kind', () => {
    try {
      catalog.render('helm-chart', 'kustomize', kustomizeConfig);
      expect.unreachable('render should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownArtifactKindError);
      if (error instanceof UnknownArtifactKindError) {
        expect(error.code).toBe('UNKNOWN_ARTIFACT_KIND');
        expect(error.kind).toBe('helm-chart');
      }
    }
  });

  it('should require an overlay for per-overlay kinds', () => {
    expect(() => renderKustomize('kustomize-overlay')).toThrow(MissingRequiredFieldError);
    expect(() => renderKustomize('argocd-application', 'staging')).toThrow(MissingRequiredFieldError);
  });

  it('should require a namespace for kustomize rendering', () => {
    expect(() => catalog.render('minio-service', 'kustomize', composeConfig)).toThrow(
      'namespace is required to render minio-service'
    );
  });

  it('should categorize artifacts by mode', () => {
    expect(artifactCategory('trino-server-config', 'compose')).toBe('properties-file');
    expect(artifactCategory('trino-server-config', 'kustomize')).toBe('manifest');
    expect(artifactCategory('compose-file', 'compose')).toBe('compose-service');
    expect(artifactCategory('verify-script', 'kustomize')).toBe('script');
    expect(artifactCategory('readme', 'kustomize')).toBe('document');
  });
});

// ============================================================================
// Query engine configuration
// ============================================================================

describe('query engine configuration', () => {
  it('should render server properties', () => {
    expect(catalog.render('trino-server-config', 'compose', composeConfig)).toBe(
      [
        'coordinator=true',
        'node-scheduler.include-coordinator=true',
        'http-server.http.port=8080',
        'query.max-memory=1GB',
        'query.max-memory-per-node=512MB',
        'discovery.uri=http://localhost:8080',
        '',
      ].join('\n')
    );
  });

  it('should render node and log properties', () => {
    expect(catalog.render('trino-node-config', 'compose', composeConfig)).toBe(
      'node.environment=demo\nnode.id=trino-demo\nnode.data-dir=/data/trino\n'
    );
    expect(catalog.render('trino-log-config', 'compose', composeConfig)).toBe('io.trino=INFO\n');
  });

  it('should render JVM options with the configured heap', () => {
    const config = resolveConfig({ memory: { heapSize: '4G' } });
    const lines = catalog.render('trino-jvm-config', 'compose', config).split('\n');

    expect(lines.slice(0, 3)).toEqual(['-server', '-Xmx4G', '-XX:+UseG1GC']);
    expect(lines).toHaveLength(16);
    expect(lines[14]).toBe('-XX:+UseAESCTRIntrinsics');
    expect(lines[15]).toBe('');
  });

  it('should render the Iceberg connector from endpoints and credentials', () => {
    expect(catalog.render('trino-catalog-config', 'compose', composeConfig)).toBe(
      [
        'connector.name=iceberg',
        'iceberg.catalog.type=nessie',
        'iceberg.nessie-catalog.uri=http://nessie:19120/api/v1',
        'iceberg.nessie-catalog.default-warehouse-dir=s3://warehouse/',
        'fs.hadoop.enabled=false',
        'fs.native-s3.enabled=true',
        's3.endpoint=http://minio:9000',
        's3.aws-access-key=test-access',
        's3.aws-secret-key=test-secret',
        's3.path-style-access=true',
        's3.region=us-east-1',
        '',
      ].join('\n')
    );
  });
});

// ============================================================================
// Compose
// ============================================================================

describe('compose file', () => {
  const content = catalog.render('compose-file', 'compose', composeConfig);
  const doc = parse(content);

  it('should start with a header comment', () => {
    expect(content.split('\n')[0]).toBe('# lakestack data-lake services');
  });

  it('should declare the three services with fixed container names', () => {
    expect(doc.version).toBe('3.8');
    expect(Object.keys(doc.services)).toEqual(['minio', 'nessie', 'trino']);
    expect(doc.services.minio.container_name).toBe('trino-minio');
    expect(doc.services.nessie.container_name).toBe('trino-nessie');
    expect(doc.services.trino.container_name).toBe('trino-coordinator');
  });

  it('should make the query engine wait for healthy dependencies', () => {
    expect(doc.services.trino.depends_on).toEqual({
      minio: { condition: 'service_healthy' },
      nessie: { condition: 'service_healthy' },
    });
  });

  it('should configure the object store', () => {
    expect(doc.services.minio).toEqual({
      image: 'minio/minio:latest',
      container_name: 'trino-minio',
      ports: ['9000:9000', '9001:9001'],
      environment: { MINIO_ROOT_USER: 'test-access', MINIO_ROOT_PASSWORD: 'test-secret' },
      command: ['server', '/data', '--console-address', ':9001'],
      volumes: ['minio_data:/data'],
      healthcheck: {
        test: ['CMD', 'curl', '-f', 'http://localhost:9000/minio/health/live'],
        interval: '30s',
        timeout: '20s',
        retries: 3,
      },
    });
  });

  it('should configure the query engine health check with a start period', () => {
    expect(doc.services.trino.healthcheck).toEqual({
      test: ['CMD-SHELL', '/usr/lib/trino/bin/health-check'],
      interval: '30s',
      timeout: '10s',
      retries: 5,
      start_period: '60s',
    });
    expect(doc.services.trino.volumes).toEqual(['./trino/etc:/etc/trino:ro']);
  });

  it('should declare the object store volume', () => {
    expect(doc.volumes).toEqual({ minio_data: {} });
  });

  it('should take credentials from the environment source', () => {
    const fromEnv = createTemplateCatalog(
      envCredentials(composeConfig.credentials, {
        LAKESTACK_S3_ACCESS_KEY: 'env-access',
        LAKESTACK_S3_SECRET_KEY: 'env-secret-key',
      })
    );
    const envDoc = parse(fromEnv.render('compose-file', 'compose', composeConfig));

    expect(envDoc.services.minio.environment).toEqual({
      MINIO_ROOT_USER: 'env-access',
      MINIO_ROOT_PASSWORD: 'env-secret-key',
    });
  });
});

describe('compose interpolation', () => {
  const dollarCatalog = createTemplateCatalog(
    staticCredentials({ accessKey: 'test-access', secretKey: 'pa$sword12' })
  );

  it('should double dollar signs in credentials so the container sees the connector secret', () => {
    const doc = parse(dollarCatalog.render('compose-file', 'compose', composeConfig));
    const connector = dollarCatalog.render('trino-catalog-config', 'compose', composeConfig);
    const secretLine = connector.split('\n').find((line) => line.startsWith('s3.aws-secret-key='));

    expect(doc.services.minio.environment.MINIO_ROOT_PASSWORD).toBe('pa$$sword12');
    expect(secretLine).toBe('s3.aws-secret-key=pa$sword12');
    expect(doc.services.minio.environment.MINIO_ROOT_PASSWORD.replace(/\$\$/g, '$')).toBe(
      'pa$sword12'
    );
  });

  it('should double dollar signs in image references', () => {
    const config = resolveConfig({ images: { catalog: 'registry.local/nessie:${TAG}' } });
    const doc = parse(catalog.render('compose-file', 'compose', config));

    expect(doc.services.nessie.image).toBe('registry.local/nessie:$${TAG}');
  });

  it('should keep Kubernetes env values from expanding variable references', () => {
    const refCatalog = createTemplateCatalog(
      staticCredentials({ accessKey: 'test-access', secretKey: 'x$(HOME)y$z' })
    );
    const deployment = parse(
      refCatalog.render('minio-deployment', 'kustomize', kustomizeConfig)
    );

    expect(deployment.spec.template.spec.containers[0].env[1]).toEqual({
      name: 'MINIO_ROOT_PASSWORD',
      value: 'x$$(HOME)y$z',
    });
  });
});

// ============================================================================
// Kustomize
// ============================================================================

describe('kustomize manifests', () => {
  it('should point each Argo CD application at its overlay namespace', () => {
    const app = parse(renderKustomize('argocd-application', 'production'));

    expect(app.metadata).toEqual({
      name: 'trino-production',
      namespace: 'argocd',
      labels: { 'app.kubernetes.io/managed-by': 'lakestack' },
    });
    expect(app.spec.destination).toEqual({
      server: 'https://kubernetes.default.svc',
      namespace: 'trino-production',
    });
    expect(app.spec.source).toEqual({
      repoURL: 'https://github.com/your-org/trino-k8s-argocd.git',
      targetRevision: 'HEAD',
      path: 'overlays/production',
    });
    expect(app.spec.syncPolicy).toEqual({
      automated: { prune: true, selfHeal: true },
      syncOptions: ['CreateNamespace=true'],
    });
  });

  it('should derive the development application', () => {
    const app = parse(renderKustomize('argocd-application', 'development'));

    expect(app.metadata.name).toBe('trino-development');
    expect(app.spec.destination.namespace).toBe('trino-development');
  });

  it('should write overlays that reference the base', () => {
    expect(parse(renderKustomize('kustomize-overlay', 'development'))).toEqual({
      apiVersion: 'kustomize.config.k8s.io/v1beta1',
      kind: 'Kustomization',
      namespace: 'trino-development',
      resources: ['../../base'],
    });
  });

  it('should list every base resource in the base kustomization', () => {
    const base = parse(renderKustomize('kustomize-base'));

    expect(base.resources).toEqual(BASE_RESOURCES.map((resource) => resource.path));
    expect(base.namespace).toBeUndefined();
  });

  it('should configure the object store deployment and claim', () => {
    const deployment = parse(renderKustomize('minio-deployment'));
    const container = deployment.spec.template.spec.containers[0];

    expect(container.args).toEqual(['server', '/data', '--console-address', ':9001']);
    expect(container.env).toEqual([
      { name: 'MINIO_ROOT_USER', value: 'test-access' },
      { name: 'MINIO_ROOT_PASSWORD', value: 'test-secret' },
    ]);
    expect(container.readinessProbe).toEqual({
      httpGet: { path: '/minio/health/ready', port: 9000 },
      initialDelaySeconds: 5,
      periodSeconds: 10,
    });
    expect(deployment.spec.template.spec.volumes).toEqual([
      { name: 'minio-data', persistentVolumeClaim: { claimName: 'minio-pvc' } },
    ]);

    const pvc = parse(renderKustomize('minio-pvc'));
    expect(pvc.metadata.name).toBe('minio-pvc');
    expect(pvc.spec).toEqual({
      accessModes: ['ReadWriteOnce'],
      resources: { requests: { storage: '10Gi' } },
    });
  });

  it('should run the catalog in memory', () => {
    const deployment = parse(renderKustomize('nessie-deployment'));
    const container = deployment.spec.template.spec.containers[0];

    expect(container.env).toEqual([{ name: 'NESSIE_VERSION_STORE_TYPE', value: 'IN_MEMORY' }]);
    expect(container.readinessProbe.httpGet).toEqual({ path: '/api/v1/config', port: 19120 });
  });

  it('should mount every query engine ConfigMap that exists', () => {
    const deployment = parse(renderKustomize('trino-deployment'));
    const spec = deployment.spec.template.spec;
    const configMapNames = ['trino-jvm-config', 'trino-server-config', 'trino-catalog-config'].map(
      (kind) => parse(catalog.render(kind, 'kustomize', kustomizeConfig)).metadata.name
    );

    expect(configMapNames).toEqual(['trino-jvm-config', 'trino-config', 'trino-catalog-config']);
    expect(spec.volumes.map((v: { configMap: { name: string } }) => v.configMap.name)).toEqual(configMapNames);
    expect(spec.containers[0].volumeMounts.map((m: { mountPath: string }) => m.mountPath)).toEqual([
      '/etc/trino/jvm.config',
      '/etc/trino/config.properties',
      '/etc/trino/node.properties',
      '/etc/trino/log.properties',
      '/etc/trino/catalog/iceberg.properties',
    ]);
    expect(spec.containers[0].readinessProbe).toEqual({
      exec: { command: ['/usr/lib/trino/bin/health-check'] },
      initialDelaySeconds: 60,
      periodSeconds: 30,
    });
  });

  it('should bundle server, node and log properties in one ConfigMap', () => {
    const configMap = parse(renderKustomize('trino-server-config'));

    expect(Object.keys(configMap.data)).toEqual(['config.properties', 'node.properties', 'log.properties']);
    expect(configMap.data['log.properties']).toBe('io.trino=INFO\n');
  });

  it('should point the connector at the generated Service names and ports', () => {
    const minio = parse(renderKustomize('minio-service'));
    const nessie = parse(renderKustomize('nessie-service'));
    const connector: string = parse(renderKustomize('trino-catalog-config')).data['iceberg.properties'];
    const apiPort = minio.spec.ports.find((p: { name: string }) => p.name === 'api').port;

    expect(connector).toContain(`s3.endpoint=http://${minio.metadata.name}:${apiPort}\n`);
    expect(connector).toContain(
      `iceberg.nessie-catalog.uri=http://${nessie.metadata.name}:${nessie.spec.ports[0].port}/api/v1\n`
    );
  });

  it('should keep credentials out of the helper scripts', () => {
    const script = renderKustomize('setup-buckets-script');

    expect(script.startsWith('#!/usr/bin/env bash\n')).toBe(true);
    expect(script).toContain('NAMESPACE="${NAMESPACE:-trino-production}"\n');
    expect(script).toContain('mc mb --ignore-existing lakestack/warehouse\n');
    expect(script).not.toContain('test-secret');
  });

  it('should document the primary overlay in the README', () => {
    const readme = renderKustomize('readme');

    expect(readme).toContain('kubectl apply -k overlays/production\n');
    expect(readme).toContain('kubectl port-forward -n trino-production svc/trino 8080:8080\n');
  });
});
