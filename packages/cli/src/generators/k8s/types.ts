/**
 * Types for Kubernetes, Kustomize and Argo CD manifest generation
 */

// ============================================================================
// K8s Resource Types
// ============================================================================

export interface K8sMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export interface K8sConfigMap {
  apiVersion: 'v1';
  kind: 'ConfigMap';
  metadata: K8sMetadata;
  data: Record<string, string>;
}

export interface K8sContainerPort {
  containerPort: number;
  name?: string;
  protocol?: 'TCP' | 'UDP';
}

export interface K8sEnvVar {
  name: string;
  value: string;
}

export interface K8sVolumeMount {
  name: string;
  mountPath: string;
  subPath?: string;
  readOnly?: boolean;
}

export interface K8sProbe {
  httpGet?: {
    path: string;
    port: number;
  };
  exec?: {
    command: string[];
  };
  initialDelaySeconds: number;
  periodSeconds: number;
}

export interface K8sContainer {
  name: string;
  image: string;
  args?: string[];
  ports?: K8sContainerPort[];
  env?: K8sEnvVar[];
  volumeMounts?: K8sVolumeMount[];
  readinessProbe?: K8sProbe;
}

export interface K8sVolume {
  name: string;
  persistentVolumeClaim?: {
    claimName: string;
  };
  configMap?: {
    name: string;
  };
}

export interface K8sPodSpec {
  containers: K8sContainer[];
  volumes?: K8sVolume[];
}

export interface K8sDeployment {
  apiVersion: 'apps/v1';
  kind: 'Deployment';
  metadata: K8sMetadata;
  spec: {
    replicas: number;
    selector: {
      matchLabels: Record<string, string>;
    };
    template: {
      metadata: {
        labels: Record<string, string>;
      };
      spec: K8sPodSpec;
    };
  };
}

export interface K8sServicePort {
  name?: string;
  port: number;
  targetPort: number;
  protocol?: 'TCP' | 'UDP';
}

export interface K8sService {
  apiVersion: 'v1';
  kind: 'Service';
  metadata: K8sMetadata;
  spec: {
    selector: Record<string, string>;
    ports: K8sServicePort[];
    type?: 'ClusterIP' | 'NodePort' | 'LoadBalancer';
  };
}

export interface K8sPersistentVolumeClaim {
  apiVersion: 'v1';
  kind: 'PersistentVolumeClaim';
  metadata: K8sMetadata;
  spec: {
    accessModes: Array<'ReadWriteOnce' | 'ReadOnlyMany' | 'ReadWriteMany'>;
    resources: {
      requests: {
        storage: string;
      };
    };
  };
}

// ============================================================================
// Kustomize & Argo CD Types
// ============================================================================

export interface Kustomization {
  apiVersion: 'kustomize.config.k8s.io/v1beta1';
  kind: 'Kustomization';
  namespace?: string;
  resources: string[];
}

export interface ArgoApplication {
  apiVersion: 'argoproj.io/v1alpha1';
  kind: 'Application';
  metadata: K8sMetadata;
  spec: {
    project: string;
    source: {
      repoURL: string;
      targetRevision: string;
      path: string;
    };
    destination: {
      server: string;
      namespace: string;
    };
    syncPolicy: {
      automated: {
        prune: boolean;
        selfHeal: boolean;
      };
      syncOptions: string[];
    };
  };
}
