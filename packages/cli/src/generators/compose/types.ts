/**
 * Types for Docker Compose generation
 */

export interface DockerHealthcheck {
  test: string[];
  interval: string;
  timeout: string;
  retries: number;
  start_period?: string;
}

export type DependencyCondition = 'service_started' | 'service_healthy';

export interface DockerService {
  image: string;
  container_name?: string;
  command?: string[];
  environment?: Record<string, string>;
  ports?: string[];
  volumes?: string[];
  depends_on?: Record<string, { condition: DependencyCondition }>;
  healthcheck?: DockerHealthcheck;
}

export interface DockerComposeConfig {
  version: string;
  services: Record<string, DockerService>;
  volumes?: Record<string, { driver?: string }>;
}
