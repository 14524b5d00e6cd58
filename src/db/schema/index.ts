export { runs } from './runs';
export type { RunRow, NewRunRow } from './runs';
