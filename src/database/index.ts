export { PostgresProbe, type DatabaseProbe, type PostgresProbeOptions } from './postgres-probe.js';
