import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Screen } from '@stepforge/shared';
import { converterConfig, serverConfig } from '../config/converter.config';
import {
  CursorActionConverter,
  NativeActionConverter,
  PixelActionConverter,
  WebActionConverter,
  isDisplayConfigurable,
  isResettable,
} from '../converters';

export const DEFAULT_SESSION_ID = 'default';

export interface SessionConverters {
  readonly native: NativeActionConverter;
  readonly pixel: PixelActionConverter;
  readonly web: WebActionConverter;
  readonly cursor: CursorActionConverter;
}

function convertersOf(session: SessionConverters): object[] {
  return [session.native, session.pixel, session.web, session.cursor];
}

/**
 * Owns one converter per dialect for every live session. Converters keep
 * cursor and capslock state between requests, so a session id must be
 * reused for consecutive steps of the same task.
 *
 * A session lives until it is removed or, once more than `maxSessions`
 * are open, until it is the least recently used one.
 */
@Injectable()
export class SessionRegistryService {
  private readonly logger = new Logger(SessionRegistryService.name);
  private readonly sessions = new Map<string, SessionConverters>();

  constructor(
    @Inject(converterConfig.KEY)
    private readonly config: ConfigType<typeof converterConfig>,
    @Inject(serverConfig.KEY)
    private readonly server: ConfigType<typeof serverConfig>,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  acquire(sessionId: string = DEFAULT_SESSION_ID): SessionConverters {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      // Re-insert so iteration order tracks recency.
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }

    const created: SessionConverters = {
      native: new NativeActionConverter(this.config),
      pixel: new PixelActionConverter(this.config),
      web: new WebActionConverter(this.config),
      cursor: new CursorActionConverter(this.config),
    };
    this.sessions.set(sessionId, created);
    this.logger.debug(`Created session ${sessionId}`);
    this.evictIdle();
    return created;
  }

  /**
   * Clears cursor and capslock state. Returns false for an unknown session.
   */
  reset(sessionId: string): boolean {
    const converters = this.sessions.get(sessionId);
    if (!converters) {
      return false;
    }
    for (const converter of convertersOf(converters)) {
      if (isResettable(converter)) {
        converter.reset();
      }
    }
    this.logger.log(`Reset session ${sessionId}`);
    return true;
  }

  remove(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.logger.log(`Closed session ${sessionId}`);
    }
    return removed;
  }

  setDisplay(sessionId: string, screen: Screen): void {
    for (const converter of convertersOf(this.acquire(sessionId))) {
      if (isDisplayConfigurable(converter)) {
        converter.setTargetScreen(screen);
      }
    }
    this.logger.log(
      `Session ${sessionId} now targets ${screen.name} (${screen.width}x${screen.height} at ${screen.x},${screen.y})`,
    );
  }

  private evictIdle(): void {
    for (const sessionId of this.sessions.keys()) {
      if (this.sessions.size <= this.server.maxSessions) {
        return;
      }
      this.sessions.delete(sessionId);
      this.logger.warn(
        `Evicted idle session ${sessionId} (limit ${this.server.maxSessions})`,
      );
    }
  }
}
