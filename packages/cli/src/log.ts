export interface Logger {
  log(message: string): void;
}

type Writer = (line: string) => void;

function pad(value: number) {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date) {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createLogger(
  write: Writer = (line) => console.log(line),
  now: () => Date = () => new Date()
): Logger {
  return {
    log(message: string) {
      write(`[${formatTimestamp(now())}] ${message}`);
    }
  };
}

/** Logger for json output mode: keeps stdout free for the result envelope. */
export function createStderrLogger(now?: () => Date): Logger {
  return createLogger((line) => process.stderr.write(`${line}\n`), now);
}
