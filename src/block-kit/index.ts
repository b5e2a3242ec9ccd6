export * from './block-kit.errors';
export * from './blocks';
export * from './document';
export * from './elements';
export * from './option';
export * from './serializer';
export * from './text';
