import { Screen } from '@stepforge/shared';

export interface Resettable {
  reset(): void;
}

export interface DisplayConfigurable {
  setTargetScreen(screen: Screen): void;
}

export function isResettable(value: object): value is Resettable {
  return 'reset' in value && typeof value.reset === 'function';
}

export function isDisplayConfigurable(
  value: object,
): value is DisplayConfigurable {
  return 'setTargetScreen' in value && typeof value.setTargetScreen === 'function';
}
