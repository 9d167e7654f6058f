import type { ReportVerbosity } from '../../report';
import type { FileFormat, FileFormatter } from './file_formatter';
import { JsonFileFormatter } from './json_formatter';
import { TextFileFormatter } from './text_formatter';

export function createFileFormatter(format: FileFormat, verbosity: ReportVerbosity): FileFormatter {
  switch (format) {
    case 'txt':
      return new TextFileFormatter(verbosity);
    case 'json':
      return new JsonFileFormatter(verbosity);
  }
}

export { FILE_FORMATS, formatFromPath } from './file_formatter';
export type { FileFormat, FileFormatter } from './file_formatter';
export { JsonFileFormatter } from './json_formatter';
export { TextFileFormatter } from './text_formatter';
