/**
 * @fileoverview Resource model, lifecycle rules, wire types and errors for mcpfleet
 */

// Resource Model
export * from './types/resources';

// Wire Protocol
export * from './types/protocol';

// Error Handling and Validation
export * from './types/errors';
export * from './validation/schemas';

// Lifecycle
export * from './lifecycle/conditions';
export * from './lifecycle/state-machine';

// Utility Types
export * from './types/common';
