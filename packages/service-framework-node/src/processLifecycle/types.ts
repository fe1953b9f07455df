import type { DiagnosticContext } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';

export type ShutdownCallback = () => Promise<void> | void;

export interface ShutdownConfiguration {
  callbackTimeout: number;
  totalTimeout: number;
}

export interface ProcessLifecycleConfig {
  shutdownConfiguration?: ShutdownConfiguration;
  diagnosticContext?: DiagnosticContext;
  restartDelay?: number;
}

export interface ProcessStartResult {
  diagnosticContext: DiagnosticContext;
  envContext: EnvContext;
}

export type ProcessStartFn = (context: ProcessLifecycleContext) => Promise<ProcessStartResult>;

export interface ProcessLifecycleContext {
  onShutdown(callback: ShutdownCallback): void;
  shutdown(): Promise<void>;
  isShuttingDown(): boolean;
  restart(): Promise<void>;
}
