import type { ExecutionEvent, Sink } from '../event_bus';
import { createPalette } from './colors';
import type { ConsoleSinkOptions, ConsoleStrategy, OutputStream, RenderContext } from './console_sink.types';
import { JsonStrategy } from './strategies/json_strategy';
import { MinimalStrategy } from './strategies/minimal_strategy';
import { StandardStrategy } from './strategies/standard_strategy';
import { VerboseStrategy } from './strategies/verbose_strategy';

export function createStrategy(options: ConsoleSinkOptions): ConsoleStrategy {
  const context: RenderContext = {
    // json output is meant for machines; never colour it
    palette: createPalette(options.color && options.format !== 'json'),
    quiet: options.quiet ?? false,
    verbosity: options.verbosity ?? 2,
  };

  switch (options.format) {
    case 'standard':
      return new StandardStrategy(context);
    case 'verbose':
      return new VerboseStrategy(context);
    case 'json':
      return new JsonStrategy(context);
    case 'minimal':
      return new MinimalStrategy(context);
  }
}

/**
 * Renders the event stream to a terminal stream as events arrive.
 */
export class ConsoleSink implements Sink {
  readonly name = 'console';
  private readonly stream: OutputStream;
  private readonly strategy: ConsoleStrategy;

  constructor(options: ConsoleSinkOptions) {
    this.stream = options.stream;
    this.strategy = createStrategy(options);
  }

  handle(event: ExecutionEvent): void {
    const text = this.strategy.render(event);
    if (text !== '') {
      this.stream.write(text);
    }
  }
}
