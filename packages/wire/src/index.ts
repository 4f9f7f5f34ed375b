export * from './ethernet.js';
export * from './ipv4.js';
export { parseHex, parseUint } from './util.js';
