const RESET = '\x1b[0m';

const CODES = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
} as const;

export type ColorName = keyof typeof CODES;

export type Palette = Record<ColorName, (text: string) => string>;

function paint(code: string): (text: string) => string {
  return text => `${code}${text}${RESET}`;
}

const plain = (text: string): string => text;

export function createPalette(enabled: boolean): Palette {
  return {
    red: enabled ? paint(CODES.red) : plain,
    green: enabled ? paint(CODES.green) : plain,
    yellow: enabled ? paint(CODES.yellow) : plain,
    cyan: enabled ? paint(CODES.cyan) : plain,
    bold: enabled ? paint(CODES.bold) : plain,
    dim: enabled ? paint(CODES.dim) : plain,
  };
}

/**
 * Colour is on only for an interactive stream with no opt-out: the noColor
 * setting, or NO_COLOR / SIEVE_NO_COLOR present in the environment.
 */
export function shouldUseColor(options: {
  noColor: boolean;
  env: NodeJS.ProcessEnv;
  isTTY: boolean | undefined;
}): boolean {
  if (options.noColor) return false;
  if (options.env['NO_COLOR'] !== undefined || options.env['SIEVE_NO_COLOR'] !== undefined) return false;
  return options.isTTY === true;
}
