import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { Screen } from '@stepforge/shared';
import {
  AllConversionsFailedError,
  TranslationError,
} from '../errors/translation.errors';
import { DisplayDto } from './dto/display.dto';
import { TranslateDialectDto, TranslateDto } from './dto/translate.dto';
import { SessionRegistryService } from './session-registry.service';
import {
  TranslationResult,
  TranslationService,
  UnknownDialectError,
} from './translation.service';

const bodyPipe = new ValidationPipe({ transform: true, whitelist: true });

@Controller()
export class TranslationController {
  private readonly logger = new Logger(TranslationController.name);

  constructor(
    private readonly translationService: TranslationService,
    private readonly sessions: SessionRegistryService,
  ) {}

  @Post('translate')
  @HttpCode(HttpStatus.OK)
  translate(@Body(bodyPipe) dto: TranslateDto): TranslationResult {
    return this.run(() =>
      this.translationService.translate(dto.raw, dto.mode, dto.sessionId),
    );
  }

  @Post('translate/:dialect')
  @HttpCode(HttpStatus.OK)
  translateDialect(
    @Param('dialect') dialect: string,
    @Body(bodyPipe) dto: TranslateDialectDto,
  ): TranslationResult {
    return this.run(() =>
      this.translationService.translateDialect(
        dialect,
        dto.actions,
        dto.sessionId,
      ),
    );
  }

  @Post('sessions/:id/reset')
  @HttpCode(HttpStatus.OK)
  reset(@Param('id') sessionId: string): { sessionId: string } {
    if (!this.sessions.reset(sessionId)) {
      throw new NotFoundException(`Session ${sessionId} not found`);
    }
    return { sessionId };
  }

  @Delete('sessions/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id') sessionId: string): void {
    if (!this.sessions.remove(sessionId)) {
      throw new NotFoundException(`Session ${sessionId} not found`);
    }
  }

  @Post('sessions/:id/display')
  @HttpCode(HttpStatus.OK)
  setDisplay(
    @Param('id') sessionId: string,
    @Body(bodyPipe) dto: DisplayDto,
  ): { sessionId: string; display: Screen } {
    const display: Screen = {
      name: dto.name ?? 'display',
      x: dto.x ?? 0,
      y: dto.y ?? 0,
      width: dto.width,
      height: dto.height,
      isPrimary: (dto.x ?? 0) === 0 && (dto.y ?? 0) === 0,
    };
    this.sessions.setDisplay(sessionId, display);
    return { sessionId, display };
  }

  private run(translate: () => TranslationResult): TranslationResult {
    try {
      return translate();
    } catch (error) {
      if (error instanceof UnknownDialectError) {
        throw new NotFoundException(error.message);
      }
      if (error instanceof TranslationError) {
        this.logger.warn(`Translation rejected (${error.code}): ${error.message}`);
        throw new BadRequestException({
          statusCode: HttpStatus.BAD_REQUEST,
          error: 'Bad Request',
          code: error.code,
          message: error.message,
          ...(error instanceof AllConversionsFailedError
            ? { failures: error.failures }
            : {}),
        });
      }
      throw error;
    }
  }
}
