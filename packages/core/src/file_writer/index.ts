export { BackgroundFileWriter } from './background_file_writer';
export type {
  BackgroundFileWriterOptions,
  OpenFile,
  WritableHandle,
  WriteJob,
  WriterMode,
  WriterShutdownReport,
} from './background_file_writer';
export { FileSink } from './file_sink';
export { AsyncQueue } from './async_queue';
export { WriterIOFault } from './errors';
export {
  createFileFormatter,
  formatFromPath,
  FILE_FORMATS,
  JsonFileFormatter,
  TextFileFormatter,
} from './formatters';
export type { FileFormat, FileFormatter } from './formatters';
