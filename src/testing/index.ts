export {
  type TransactionOperation,
  type TransactionCall,
  type PublishedBatch,
  type LogCapture,
  RecordingTransactionManager,
  RecordingEventSink,
  createLogCapture,
} from './fakes.js';
