import type { FacePreview } from '../cubemap/preview';
import type { Logger, TablePrinter, Uv, Vec3 } from '../types';
import type { RoundTripCheckResult } from './roundtrip';

export interface RoundTripRow {
  input: string;
  uv: string;
  decoded: string;
  error: number;
  ok: boolean;
}

export interface FacePreviewRow {
  uv: string;
  label: string;
  direction: string;
  color: string;
}

interface ReportOptions {
  logger?: Logger;
  printer?: TablePrinter;
}

export const defaultLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message)
};

const round = (value: number) => Math.round(value * 1e6) / 1e6;

const formatNumbers = (...values: number[]) => values.map((value) => String(round(value))).join(', ');

const formatVec3 = (vec: Vec3 | null) => (vec ? formatNumbers(vec.x, vec.y, vec.z) : '-');

const formatUv = (uv: Uv | null) => (uv ? formatNumbers(uv.u, uv.v) : '-');

const printRows = (rows: unknown[], printer: TablePrinter) => {
  if (printer.table) {
    printer.table(rows);
  } else {
    printer.log(rows);
  }
};

export const listRoundTripRows = (result: RoundTripCheckResult): RoundTripRow[] =>
  result.results.map((entry) => ({
    input: formatVec3(entry.direction),
    uv: formatUv(entry.uv),
    decoded: formatVec3(entry.decoded),
    error: round(entry.error),
    ok: entry.ok
  }));

export const printRoundTripReport = (result: RoundTripCheckResult, options: ReportOptions = {}) => {
  const logger = options.logger ?? defaultLogger;
  const rows = listRoundTripRows(result);
  printRows(rows, options.printer ?? console);
  const failed = rows.filter((row) => !row.ok).length;
  const summary = `round-trip ${rows.length - failed}/${rows.length} within ${result.epsilon} (max error ${result.maxError})`;
  if (failed > 0) {
    logger.warn(summary);
  } else {
    logger.info(summary);
  }
  return rows;
};

export const listFacePreviewRows = (previews: readonly FacePreview[]): FacePreviewRow[] =>
  previews.map((preview) => ({
    uv: formatUv(preview.uv),
    label: preview.label,
    direction: formatVec3(preview.direction),
    color: preview.color ? preview.color.join(', ') : '-'
  }));

export const printFacePreview = (previews: readonly FacePreview[], options: ReportOptions = {}) => {
  const rows = listFacePreviewRows(previews);
  printRows(rows, options.printer ?? console);
  return rows;
};
