export type { ServiceAdapter } from './base.js';
export { MidiServiceAdapter, addressPattern, type MidiServiceAdapterOptions } from './midi-service.js';
