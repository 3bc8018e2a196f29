export * from './base.converter';
export * from './capabilities';
export * from './session-state';
export * from './native.converter';
export * from './pixel.converter';
export * from './web.converter';
export * from './cursor.converter';
