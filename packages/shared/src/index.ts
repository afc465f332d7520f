export * from './geometry';
export * from './panelConfig';
export * from './protocol';
