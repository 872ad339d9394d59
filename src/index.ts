// bsdiff patch container decoding

export * from './bsdiff/index.ts';
export { default } from './bsdiff/PatchReader.ts';
export * from './types.ts';
