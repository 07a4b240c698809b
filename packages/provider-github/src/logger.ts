export interface ProviderLogger {
  debug(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
}

export const silentLogger: ProviderLogger = {
  debug() {},
  warn() {}
};
