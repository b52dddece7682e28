export {
  consumeTopic,
  superviseTopic,
  startConsumers,
  restartDelay,
  NO_RESTART,
  RESTART_WITH_BACKOFF,
} from './topic-consumer.js';
export type { ConsumerExit, ConsumerOutcome, RestartPolicy } from './topic-consumer.js';
