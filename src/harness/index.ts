export {
  ServiceHarness,
  withService,
  runVerification,
  harnessOptionsFromConfig,
  type ServiceHarnessOptions,
  type HarnessInfo,
  type HarnessRunResult,
  type HarnessEvent,
  type LaunchSpec,
} from './service-harness.js';
export { scanForReadiness, type ScanOptions } from './readiness.js';
export { verifyEndpoint, type VerifyOptions } from './verifier.js';
export { terminateProcess, sendSignal, waitForExit, type TerminateOptions } from './terminator.js';
export { AddressRegistry, isProcessAlive, type AddressClaim, type ReleaseClaim } from './registry.js';
export {
  formatAddress,
  serviceUrl,
  isPortAvailable,
  allocatePort,
  resolveAddress,
} from './address.js';
export { MidiServiceAdapter, addressPattern, type ServiceAdapter } from './adapters/index.js';
export { loadConfig, HarnessConfigSchema, type HarnessConfig } from '../config.js';
export * from '../errors.js';
export type * from '../types.js';
