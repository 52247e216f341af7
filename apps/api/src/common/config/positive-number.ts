import { ConfigService } from '@nestjs/config';

/**
 * Reads a numeric setting. Anything that is not a positive finite number
 * (unset, empty, "abc", "0", "-5") yields the fallback.
 */
export function readPositiveNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<number | string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}
