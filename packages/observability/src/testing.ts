export { createRecordingTracer } from "./recording-tracer.js";
export type { RecordedObservation, RecordingTracer } from "./recording-tracer.js";
