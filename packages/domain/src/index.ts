// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/alert.js';
export * from './entities/alert-metadata.js';
export * from './entities/rule.js';
export * from './entities/transition.js';

// ─── State machine / errors ───────────────────────────────────────────────────
export * from './state-machine.js';
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/alert-lifecycle.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/alert-store.port.js';
export * from './ports/outbound/rule-store.port.js';
export * from './ports/outbound/clock.port.js';
