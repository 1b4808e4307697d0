export * from './common';
export * from './language';
export * from './normalization';
export * from './diff';
export * from './asr';
