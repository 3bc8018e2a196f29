import { registerAs } from '@nestjs/config';
import { CapsLockMode, ParserMode } from '@stepforge/shared';
import { plainToClass, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export interface ConverterConfig {
  readonly targetWidth: number;
  readonly targetHeight: number;
  // seconds
  readonly dragDuration: number;
  readonly scrollAmount: number;
  readonly waitDuration: number;
  readonly hotkeyInterval: number;
  readonly capsLockMode: CapsLockMode;
  readonly strictCoordinates: boolean;
  readonly preventCornerLock: boolean;
}

export interface ServerConfig {
  readonly port: number;
  readonly parserMode: ParserMode;
  readonly logDir?: string;
  // Least recently used sessions are dropped beyond this count.
  readonly maxSessions: number;
}

export const DEFAULT_CONVERTER_CONFIG: ConverterConfig = Object.freeze({
  targetWidth: 1920,
  targetHeight: 1080,
  dragDuration: 0.5,
  scrollAmount: 2,
  waitDuration: 1,
  hotkeyInterval: 0.1,
  capsLockMode: 'session',
  strictCoordinates: false,
  preventCornerLock: false,
});

export const DEFAULT_MAX_SESSIONS = 256;

export function createConverterConfig(
  overrides: Partial<ConverterConfig> = {},
): ConverterConfig {
  return Object.freeze({ ...DEFAULT_CONVERTER_CONFIG, ...overrides });
}

const toBoolean = ({ value }: { value: unknown }) => {
  if (typeof value !== 'string') {
    return value;
  }
  const lowered = value.trim().toLowerCase();
  if (lowered === 'true' || lowered === '1') {
    return true;
  }
  if (lowered === 'false' || lowered === '0') {
    return false;
  }
  return value;
};

/**
 * Environment variables recognised by the service. Unset variables fall
 * back to the defaults above.
 */
export class StepforgeEnvironment {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  STEPFORGE_TARGET_WIDTH?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  STEPFORGE_TARGET_HEIGHT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  STEPFORGE_DRAG_DURATION?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  STEPFORGE_SCROLL_AMOUNT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  STEPFORGE_WAIT_DURATION?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  STEPFORGE_HOTKEY_INTERVAL?: number;

  @IsOptional()
  @IsIn(['session', 'system'])
  STEPFORGE_CAPSLOCK_MODE?: CapsLockMode;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  STEPFORGE_STRICT_COORDINATES?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  STEPFORGE_PREVENT_CORNER_LOCK?: boolean;

  @IsOptional()
  @IsIn(['tagged', 'tool-call', 'auto'])
  STEPFORGE_PARSER_MODE?: ParserMode;

  @IsOptional()
  @IsString()
  STEPFORGE_LOG_DIR?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  STEPFORGE_PORT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  STEPFORGE_MAX_SESSIONS?: number;
}

export function validateEnvironment(
  env: Record<string, string | undefined>,
): StepforgeEnvironment {
  const parsed = plainToClass(StepforgeEnvironment, env);
  const errors = validateSync(parsed, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed;
}

export function loadConverterConfig(
  env: Record<string, string | undefined> = process.env,
): ConverterConfig {
  const vars = validateEnvironment(env);
  const defaults = DEFAULT_CONVERTER_CONFIG;
  return createConverterConfig({
    targetWidth: vars.STEPFORGE_TARGET_WIDTH ?? defaults.targetWidth,
    targetHeight: vars.STEPFORGE_TARGET_HEIGHT ?? defaults.targetHeight,
    dragDuration: vars.STEPFORGE_DRAG_DURATION ?? defaults.dragDuration,
    scrollAmount: vars.STEPFORGE_SCROLL_AMOUNT ?? defaults.scrollAmount,
    waitDuration: vars.STEPFORGE_WAIT_DURATION ?? defaults.waitDuration,
    hotkeyInterval: vars.STEPFORGE_HOTKEY_INTERVAL ?? defaults.hotkeyInterval,
    capsLockMode: vars.STEPFORGE_CAPSLOCK_MODE ?? defaults.capsLockMode,
    strictCoordinates:
      vars.STEPFORGE_STRICT_COORDINATES ?? defaults.strictCoordinates,
    preventCornerLock:
      vars.STEPFORGE_PREVENT_CORNER_LOCK ?? defaults.preventCornerLock,
  });
}

export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const vars = validateEnvironment(env);
  return Object.freeze({
    port: vars.STEPFORGE_PORT ?? 9991,
    parserMode: vars.STEPFORGE_PARSER_MODE ?? 'auto',
    logDir: vars.STEPFORGE_LOG_DIR || undefined,
    maxSessions: vars.STEPFORGE_MAX_SESSIONS ?? DEFAULT_MAX_SESSIONS,
  });
}

export const converterConfig = registerAs('converter', () =>
  loadConverterConfig(),
);

export const serverConfig = registerAs('server', () => loadServerConfig());
