/**
 * Barrel Export für alle Repository-Module
 */

// Job Runs Repository
export { recordRun, getRecentRuns, getRunsForJob, getRunStats } from './jobRuns.js';
export type { JobRunRecord, RunStats } from './jobRuns.js';
