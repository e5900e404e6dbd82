// Public library surface.

export const VERSION = '0.1.0';

export * from './errors/argParseErrors';
export * from './convert/valueTypes';
export * from './convert/convert';
export * from './options/optionDeclaration';
export * from './registry/optionRegistry';
export * from './parse/classifyToken';
export * from './parse/extractValues';
export * from './parse/argumentParser';
export * from './declarations/loadDeclarations';
export * from './output/writeResultJson';
export * from './util/deterministicJson';
