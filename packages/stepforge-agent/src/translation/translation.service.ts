import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
  CommandEntry,
  DialectName,
  ExecutionStep,
  ParserMode,
} from '@stepforge/shared';
import { z } from 'zod';
import { DONE, FAIL } from '../commands/command-builder';
import { toSteps } from '../commands/step-translator';
import { serverConfig } from '../config/converter.config';
import { FormatError } from '../errors/translation.errors';
import { parseOutput } from '../parser/output-parser';
import {
  cursorActionSchema,
  pixelActionSchema,
  webActionSchema,
} from './dialect-action.schemas';
import { SessionConverters, SessionRegistryService } from './session-registry.service';

export type ActionDialect = Exclude<DialectName, 'native'>;

export const ACTION_DIALECTS: readonly ActionDialect[] = ['pixel', 'web', 'cursor'];

export interface TranslationResult {
  reason: string;
  stop: boolean;
  commands: CommandEntry[];
  steps: ExecutionStep[];
}

type DialectTranslator = (
  session: SessionConverters,
  actions: readonly unknown[],
) => CommandEntry[];

function parseActions<T extends z.ZodTypeAny>(
  schema: T,
  dialect: ActionDialect,
  actions: readonly unknown[],
): z.infer<T>[] {
  const result = z.array(schema).safeParse(actions);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new FormatError(`Invalid ${dialect} actions: ${issues}`);
  }
  return result.data;
}

const DIALECT_TRANSLATORS: ReadonlyMap<string, DialectTranslator> = new Map<
  ActionDialect,
  DialectTranslator
>([
  [
    'pixel',
    (session, actions) =>
      session.pixel.convert(parseActions(pixelActionSchema, 'pixel', actions)),
  ],
  [
    'web',
    (session, actions) =>
      session.web.convert(parseActions(webActionSchema, 'web', actions)),
  ],
  [
    'cursor',
    (session, actions) =>
      session.cursor.convert(parseActions(cursorActionSchema, 'cursor', actions)),
  ],
]);

export class UnknownDialectError extends Error {
  constructor(readonly dialect: string) {
    super(
      `Unknown action dialect: '${dialect}'. Supported: ${ACTION_DIALECTS.join(', ')}`,
    );
    this.name = UnknownDialectError.name;
  }
}

/**
 * Runs model output through parsing, conversion and step translation
 * against the converters of one session.
 */
@Injectable()
export class TranslationService {
  private readonly logger = new Logger(TranslationService.name);

  constructor(
    private readonly sessions: SessionRegistryService,
    @Inject(serverConfig.KEY)
    private readonly server: ConfigType<typeof serverConfig>,
  ) {}

  translate(
    raw: string,
    mode: ParserMode = this.server.parserMode,
    sessionId?: string,
  ): TranslationResult {
    const step = parseOutput(raw, mode);
    this.logger.debug(
      `Parsed ${step.actions.length} action(s) with ${mode} grammar`,
    );

    const { native } = this.sessions.acquire(sessionId);
    const commands = native.convert(step.actions);
    return {
      reason: step.reason,
      stop: step.stop,
      commands,
      steps: toSteps(commands),
    };
  }

  translateDialect(
    dialect: string,
    actions: readonly unknown[],
    sessionId?: string,
  ): TranslationResult {
    const translator = DIALECT_TRANSLATORS.get(dialect);
    if (!translator) {
      throw new UnknownDialectError(dialect);
    }

    const commands = translator(this.sessions.acquire(sessionId), actions);
    return {
      reason: '',
      stop: commands.some(
        (entry) => entry.command === DONE || entry.command === FAIL,
      ),
      commands,
      steps: toSteps(commands),
    };
  }
}
