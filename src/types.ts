export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Uv {
  u: number;
  v: number;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
}

export interface TablePrinter {
  table?: (rows: unknown) => void;
  log: (...args: unknown[]) => void;
}
