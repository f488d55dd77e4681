import { ExecutorRegistry } from './registry.js';
import { RoiScanExecutor, type RoiScanOptions } from './roiScan.js';
import { ProductionExecutor } from './production.js';
import { InsightExecutor } from './insight.js';
import { WriteResultExecutor } from './writeResult.js';

export { ExecutorRegistry } from './registry.js';
export type { Executor, ExecutorContext } from './types.js';

export interface DefaultRegistryOptions {
  roiScan?: RoiScanOptions;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ExecutorRegistry {
  return new ExecutorRegistry()
    .register(new RoiScanExecutor(options.roiScan))
    .register(new ProductionExecutor())
    .register(new InsightExecutor())
    .register(new WriteResultExecutor());
}
