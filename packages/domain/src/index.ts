// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-snapshot.js';
export * from './entities/recording-session.js';
export * from './entities/stored-telemetry.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/session-repository.port.js';
export * from './ports/outbound/telemetry-repository.port.js';
export * from './ports/outbound/store-diagnostics.port.js';
export * from './ports/outbound/clock.port.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';
