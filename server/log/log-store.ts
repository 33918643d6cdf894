import type { LogEntry, LogLine } from "./log-types";

/**
 * Append-only, in-memory run log. Entries are never removed or reordered;
 * `seq` doubles as a cursor for clients that reconnect.
 */
export class LogStore {
	private readonly entries: LogEntry[] = [];

	append(line: LogLine): LogEntry {
		const entry: LogEntry = {
			seq: this.entries.length + 1,
			at: new Date().toISOString(),
			kind: line.kind,
			text: line.text,
			...(line.stream ? { stream: line.stream } : {}),
		};
		this.entries.push(entry);
		return entry;
	}

	/** Entries with `seq` greater than `afterSeq`, oldest first. */
	list(afterSeq = 0): LogEntry[] {
		if (afterSeq <= 0) {
			return [...this.entries];
		}
		return this.entries.slice(afterSeq);
	}

	get size(): number {
		return this.entries.length;
	}
}
