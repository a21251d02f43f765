/**
 * @changegate/shared
 *
 * The human-gated change workflow engine: ledger, replay, state machine,
 * approval gate, classifier and reconciler.
 */

// Re-export all types
export * from './types/index';

// Re-export errors
export * from './errors/index';

// Re-export logger
export * from './logger/index';

// Re-export config validation
export * from './config/index';

// Re-export database module
export * from './db/index';

// Re-export decision ledger
export * from './ledger/index';

// Re-export replay and view cache
export * from './replay/index';
export * from './replay/store';

// Re-export runs module
export * from './runs/index';

// Re-export orchestrator (state machine)
export * from './orchestrator/index';

// Re-export registration modules
export * from './findings/index';
export * from './drift/index';

// Re-export plans and approval gate
export * from './plans/index';
export * from './approvals/index';

// Re-export classifier, reconciler and scans
export * from './classifier/index';
export * from './reconciler/index';
export * from './scan/index';

// Re-export reports
export * from './report/index';
