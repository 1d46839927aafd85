export interface LoggerPort {
  info(msg: string): void;
  error(msg: string, err?: unknown): void;
}
