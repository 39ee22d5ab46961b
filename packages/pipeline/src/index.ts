/**
 * Pipeline Package Entry Point
 *
 * Stage workers, queues and status fanout for the document pipeline:
 * upload → extraction → generation, with compare-and-set transitions in the
 * job store as the only coordination between workers.
 */

export * from './artifacts/gateway';
export * from './bus/status-bus';
export * from './bus/pg-relay';
export * from './collaborators';
export * from './dead-letter';
export * from './lifecycle';
export * from './pipeline';
export * from './queue/types';
export * from './queue/memory';
export * from './queue/sqs';
export { computeBackoff, withTimeout, type BackoffPolicy, type Disposition } from './stages/common';
export {
  EXTRACTION_LAYOUT,
  GENERATION_LAYOUT,
  type StageContext,
  type StageHandler,
  type StageLayout
} from './stages/stage';
export * from './stages/extraction';
export * from './stages/generation';
export * from './upload';
export * from './watch';
export * from './worker';
