interface LoggerConfig {
  verbose: boolean;
  quiet: boolean;
  stream: "stdout" | "stderr";
}

const config: LoggerConfig = {
  verbose: false,
  quiet: false,
  stream: "stdout",
};

const isDev = process.env.MEMLANE_ENV === "development" || process.env.NODE_ENV === "development";

type LogMessage = string | (() => string);

export function initLogger(options?: {
  verbose?: boolean;
  quiet?: boolean;
  stream?: "stdout" | "stderr";
}): void {
  if (options?.verbose !== undefined) {
    config.verbose = options.verbose;
  } else if (config.verbose === false) {
    config.verbose = isDev;
  }

  if (options?.quiet !== undefined) {
    config.quiet = options.quiet;
  }

  // stdio MCP transports own stdout
  if (options?.stream !== undefined) {
    config.stream = options.stream;
  }
}

function render(message: LogMessage): string {
  return typeof message === "function" ? message() : message;
}

function write(line: string): void {
  if (config.stream === "stderr") {
    process.stderr.write(`${line}\n`);
  } else {
    console.log(line);
  }
}

export function debug(message: LogMessage): void {
  if (!config.verbose) return;
  write(`[DEBUG] ${render(message)}`);
}

export function info(message: LogMessage): void {
  if (config.quiet) return;
  if (!config.verbose) return; // info is verbose-only in prod
  write(`[INFO] ${render(message)}`);
}

export function warn(message: LogMessage): void {
  if (config.quiet) return;
  console.warn(`[WARN] ${render(message)}`);
}

export function error(message: LogMessage): void {
  console.error(`[ERROR] ${render(message)}`);
}

export async function timingAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  try {
    return await fn();
  } finally {
    const elapsed = performance.now() - start;
    if (config.verbose) {
      write(`[TIMING] ${label}: ${elapsed.toFixed(2)}ms`);
    }
  }
}
