import type { OutputEvent, OutputSink } from '../types';

export function format_event(event: OutputEvent): string {
  switch (event.kind) {
    case 'reminder':
      return `📌 ${event.text}`;
    case 'table_roll':
      return `🎲 ${event.table} (${event.roll}): ${event.text}`;
    case 'roll':
      return `🎲 ${event.expression} = ${event.total}`;
    default: {
      const _exhaustive: never = event;
      return String(_exhaustive);
    }
  }
}

/** Prints each event as one line as it happens. */
export function console_sink(write: (line: string) => void = (line) => console.log(line)): OutputSink {
  return { emit: (event) => write(format_event(event)) };
}
