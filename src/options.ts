export interface DecodeOptions {
  /** Byte order of every section; ELF images report theirs. */
  littleEndian: boolean;
  /** Steps a single location expression may execute. */
  maxExpressionSteps: number;
  /** Opcodes a single line program may execute. */
  maxLineProgramSteps: number;
  /** Instructions a single CIE + FDE replay may execute. */
  maxCallFrameSteps: number;
}

export const DEFAULT_OPTIONS: Readonly<DecodeOptions> = {
  littleEndian: true,
  maxExpressionSteps: 10_000,
  maxLineProgramSteps: 1_000_000,
  maxCallFrameSteps: 100_000,
};

export function resolveOptions(options: Partial<DecodeOptions> = {}): DecodeOptions {
  return {
    littleEndian: options.littleEndian ?? DEFAULT_OPTIONS.littleEndian,
    maxExpressionSteps:
      options.maxExpressionSteps ?? DEFAULT_OPTIONS.maxExpressionSteps,
    maxLineProgramSteps:
      options.maxLineProgramSteps ?? DEFAULT_OPTIONS.maxLineProgramSteps,
    maxCallFrameSteps:
      options.maxCallFrameSteps ?? DEFAULT_OPTIONS.maxCallFrameSteps,
  };
}
