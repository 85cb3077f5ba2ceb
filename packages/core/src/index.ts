export const name = '@gitremap/core';

export * from './pattern/regex-ast';
export * from './pattern/uri-pattern';
export * from './rewrite/types';
export * from './rewrite/format';
export * from './rewrite/engine';
export * from './rewrite/list';
export * from './config/loader';
export * from './runner';
