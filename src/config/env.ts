export type Env = {
  PORT: number;
  RATE_LIMIT_BURST: number;
  RATE_LIMIT_WINDOW_SECONDS: number;
};

function int(source: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = source[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    PORT: int(source, "PORT", 3000),
    RATE_LIMIT_BURST: int(source, "RATE_LIMIT_BURST", 5),
    RATE_LIMIT_WINDOW_SECONDS: int(source, "RATE_LIMIT_WINDOW_SECONDS", 10),
  };
}
