/**
 * status  -- user-facing note from the console itself
 * command -- the echoed command line of a run
 * output  -- one line of child output
 * exit    -- the terminal "Exit code: N" line of a run
 * error   -- a run that could not be started
 */
export type LogEntryKind = "status" | "command" | "output" | "exit" | "error";

export type OutputStream = "stdout" | "stderr";

/** An entry as produced, before the log assigns its position. */
export interface LogLine {
	kind: LogEntryKind;
	text: string;
	stream?: OutputStream;
}

export interface LogEntry extends LogLine {
	/** 1-based, strictly increasing */
	seq: number;
	/** ISO 8601 UTC */
	at: string;
}

export type LogSink = (line: LogLine) => void;
