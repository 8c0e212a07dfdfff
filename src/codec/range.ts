export interface OutOfRangeWarning {
  kind: 'OutOfRangeWarning';
  u: number;
  v: number;
}

const inUnitInterval = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;

export const isUvInRange = (u: number, v: number) => inUnitInterval(u) && inUnitInterval(v);

export const checkUvRange = (u: number, v: number): OutOfRangeWarning | null => {
  if (isUvInRange(u, v)) {
    return null;
  }
  return { kind: 'OutOfRangeWarning', u, v };
};

export const formatOutOfRangeWarning = (warning: OutOfRangeWarning) =>
  `uv out of range: (${warning.u}, ${warning.v})`;
