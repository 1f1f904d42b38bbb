export { TranscriptRecorder, type TranscriptRecorderDeps, type RecorderStats } from "./TranscriptRecorder.js";
export { JsonlTranscriptWriter } from "./JsonlTranscriptWriter.js";
export type { TranscriptRecord, TranscriptWriter } from "./types.js";
