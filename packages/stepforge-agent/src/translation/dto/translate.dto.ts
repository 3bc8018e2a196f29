import { ParserMode } from '@stepforge/shared';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export const PARSER_MODES: readonly ParserMode[] = ['tagged', 'tool-call', 'auto'];

export class TranslateDto {
  @IsString()
  raw!: string;

  @IsOptional()
  @IsIn(PARSER_MODES)
  mode?: ParserMode;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  sessionId?: string;
}

/**
 * Dialect actions are checked against the dialect's own schema by the
 * service; this only requires a list.
 */
export class TranslateDialectDto {
  @IsArray()
  actions!: unknown[];

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  sessionId?: string;
}
