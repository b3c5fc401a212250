/**
 * AWS SageMaker Training Integration
 *
 * Validates action inputs, builds CreateTrainingJob requests, submits them,
 * and waits for training jobs to finish.
 *
 * @module @sagemaker-action/aws-sagemaker
 */

// ============================================================================
// Types
// ============================================================================

export * from './types/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export * from './error/index.js';

// ============================================================================
// Validation and Request Building
// ============================================================================

export * from './validation/index.js';
export * from './builders/index.js';

// ============================================================================
// Client
// ============================================================================

export * from './client/index.js';
export * from './credentials/index.js';

// ============================================================================
// Action
// ============================================================================

export * from './action/index.js';

// ============================================================================
// Observability and Utilities
// ============================================================================

export { ConsoleLogger, NoopLogger, logLevelFromEnv } from './observability/logging.js';
export type { Logger, LogLevel, LogContext, LogSink } from './observability/logging.js';
export * from './utils/index.js';
