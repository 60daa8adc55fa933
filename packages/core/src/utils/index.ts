export * from './clock';
export * from './names';
export * from './fs';
export * from './validation';
