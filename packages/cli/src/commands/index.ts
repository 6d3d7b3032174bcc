/**
 * lakestack CLI commands
 *
 * - init      - write the config file
 * - generate  - write the Compose or Kustomize layout
 * - up/down   - run or remove the Compose stack
 * - health    - check the running stack
 */

export { initCommand } from './init';
export { generateCommand } from './generate';
export { upCommand } from './up';
export { downCommand } from './down';
export { healthCommand } from './health';
