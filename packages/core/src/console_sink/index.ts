export { ConsoleSink, createStrategy } from './console_sink';
export { createPalette, shouldUseColor } from './colors';
export type { ColorName, Palette } from './colors';
export { CONSOLE_FORMATS } from './console_sink.types';
export type {
  ConsoleFormat,
  ConsoleSinkOptions,
  ConsoleStrategy,
  OutputStream,
} from './console_sink.types';
