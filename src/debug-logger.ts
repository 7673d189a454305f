/**
 * Debug logging for the resolution engine.
 * Controlled by environment variables:
 * - REFUTE_DEBUG=true to enable debug logging
 * - REFUTE_DEBUG_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - REFUTE_DEBUG_FILTER=STORE,RESOLUTION,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  PARSE = 'PARSE',
  STORE = 'STORE',
  UNIFY = 'UNIFY',
  RESOLUTION = 'RESOLUTION',
  PROVER = 'PROVER',
}

function parseLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    default:
      return LogLevel.DEBUG;
  }
}

export class DebugLogger {
  private enabled: boolean;
  private level: LogLevel;
  private componentFilter: Set<string> | null;

  constructor(
    env: NodeJS.ProcessEnv = process.env,
    private readonly sink: (line: string) => void = (line) => console.log(line)
  ) {
    this.enabled = env.REFUTE_DEBUG === 'true';
    this.level = parseLevel(env.REFUTE_DEBUG_LEVEL);

    const filterStr = env.REFUTE_DEBUG_FILTER;
    if (filterStr) {
      this.componentFilter = new Set(
        filterStr.split(',').map((s) => s.trim().toUpperCase())
      );
    } else {
      this.componentFilter = null; // null means log all components
    }
  }

  isEnabled(level: LogLevel, component: LogComponent): boolean {
    if (!this.enabled) return false;
    if (level < this.level) return false;
    if (this.componentFilter && !this.componentFilter.has(component))
      return false;
    return true;
  }

  private formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${LogLevel[level]}] [${component}] ${message}`;
  }

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  /**
   * Logs a message about a stored clause. The clause is only rendered when
   * the message is actually going to be written.
   */
  logClause(
    component: LogComponent,
    level: LogLevel,
    prefix: string,
    clause: { id?: number },
    renderFn?: () => string
  ): void {
    if (!this.isEnabled(level, component)) return;

    let message = prefix;
    if (clause.id !== undefined) {
      message += ` #${clause.id}`;
    }
    if (renderFn) {
      message += `: ${renderFn()}`;
    }

    this.log(level, component, message);
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.isEnabled(level, component)) {
      this.sink(this.formatMessage(level, component, message));
    }
  }
}

// Singleton instance
export const debugLogger = new DebugLogger();
