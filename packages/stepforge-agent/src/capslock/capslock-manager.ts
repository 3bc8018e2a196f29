import { CapsLockMode } from '@stepforge/shared';

/**
 * Tracks caps lock for one automation session.
 *
 * In `session` mode the state is virtual: toggling flips a flag and typed
 * text is upper-cased while it is set. In `system` mode the OS owns the
 * state, toggling is a no-op and text passes through untouched.
 */
export class CapsLockManager {
  private enabled: boolean;

  constructor(
    readonly mode: CapsLockMode = 'session',
    enabled = false,
  ) {
    this.enabled = mode === 'session' && enabled;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  toggle(): void {
    if (this.mode === 'session') {
      this.enabled = !this.enabled;
    }
  }

  reset(): void {
    this.enabled = false;
  }

  transformText(text: string): string {
    if (this.mode === 'session' && this.enabled) {
      return text.toUpperCase();
    }
    return text;
  }

  shouldDelegateToSystem(): boolean {
    return this.mode === 'system';
  }
}
