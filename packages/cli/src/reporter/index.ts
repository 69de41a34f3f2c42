export { Reporter, resolveColor } from './reporter';
export type { ReporterOptions } from './reporter';
