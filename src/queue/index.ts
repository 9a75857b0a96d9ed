export { getRedisConnection, closeRedisConnection } from "./connection.js";
export { getTriageQueue, addTriageJob, closeTriageQueue, TRIAGE_JOB_NAME } from "./triage-queue.js";
export {
  processTriageJob,
  startTriageWorker,
  stopTriageWorker,
  toProjection,
} from "./triage-processor.js";
export type { TriageJobData, TriageJobResult, TriageProjection } from "./triage-processor.js";
