export type Logger = Pick<Console, "info" | "warn" | "error">;

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
