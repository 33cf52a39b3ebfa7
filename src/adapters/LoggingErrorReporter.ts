import type { ErrorContext, ErrorReporter } from "../lib/boundaries";
import { createLogger, type Logger } from "../lib/logger";

export class LoggingErrorReporter implements ErrorReporter {
  private count = 0;

  constructor(private readonly logger: Logger = createLogger("Errors")) {}

  /** Errors reported so far */
  get reported(): number {
    return this.count;
  }

  report(error: Error, context: ErrorContext): void {
    this.count++;
    const { stage, ...rest } = context;
    this.logger.error(`[${stage}] ${error.name}: ${error.message}`, rest, error.cause ?? "");
  }
}
