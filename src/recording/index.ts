export {
  RecordingSchema,
  RecordingExecutor,
  getRecordingPath,
  saveRecording,
  type Recording,
} from './recorder.js';

export {
  ReplayExecutor,
  hasRecording,
  loadRecording,
} from './replayer.js';
