import { OutputDescriptorSchema, type OutputDescriptor } from '@edgebar/shared';

const OUTPUT_ARG_PATTERN = /^([^:]+):(\d+)x(\d+)(?:@(\d+(?:\.\d+)?))?$/;

/**
 * Parses `NAME:WIDTHxHEIGHT` with an optional `@SCALE` suffix, e.g. `DP-1:1920x1080@2`.
 */
export function parseOutputArg(value: string): OutputDescriptor {
  const match = OUTPUT_ARG_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid output "${value}", expected NAME:WIDTHxHEIGHT[@SCALE]`);
  }
  const [, name, width, height, scale] = match;
  return OutputDescriptorSchema.parse({
    name,
    width: Number(width),
    height: Number(height),
    ...(scale !== undefined ? { scale: Number(scale) } : {}),
  });
}
