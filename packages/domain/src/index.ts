// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/trip-row.js';
export * from './entities/log-record.js';
export * from './entities/trip-record.js';
export * from './entities/daily-kpi.js';
export * from './entities/object-notification.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/trip-ingestion.port.js';
export * from './ports/inbound/trip-merge.port.js';
export * from './ports/inbound/kpi-aggregation.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/object-store.port.js';
export * from './ports/outbound/append-log.port.js';
export * from './ports/outbound/trip-store.port.js';
