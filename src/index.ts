// ============================================================================
// covenant-pathways — Public API Surface
// ============================================================================

// ---- Errors & logging ------------------------------------------------------
export * from './errors.js';
export * from './logger.js';

// ---- Values forwarded to bodies --------------------------------------------
export * from './clause.js';
export * from './context.js';
export * from './template.js';

// ---- Arguments & schemas ---------------------------------------------------
export * from './argument.js';
export * from './schemaCache.js';

// ---- Guards & compile gates ------------------------------------------------
export * from './guard.js';
export * from './compileGate.js';

// ---- Pathways & registries -------------------------------------------------
export * from './pathway.js';
export * from './registry.js';
export * from './contract.js';

// ---- Compilation session ---------------------------------------------------
export * from './session.js';
