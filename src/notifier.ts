export type NotificationLevel = 'info' | 'warning' | 'error';

export interface Notifier {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export class ConsoleNotifier implements Notifier {
	constructor(
		private readonly out: NodeJS.WritableStream = process.stdout,
		private readonly err: NodeJS.WritableStream = process.stderr
	) {}

	info(message: string): void {
		this.out.write(`${message}\n`);
	}

	warn(message: string): void {
		this.err.write(`warning: ${message}\n`);
	}

	error(message: string): void {
		this.err.write(`error: ${message}\n`);
	}
}

/** Keeps every message; used where output is inspected rather than shown. */
export class RecordingNotifier implements Notifier {
	readonly messages: Array<{ level: NotificationLevel; message: string }> = [];

	info(message: string): void {
		this.messages.push({ level: 'info', message });
	}

	warn(message: string): void {
		this.messages.push({ level: 'warning', message });
	}

	error(message: string): void {
		this.messages.push({ level: 'error', message });
	}

	of(level: NotificationLevel): string[] {
		return this.messages.filter((entry) => entry.level === level).map((entry) => entry.message);
	}
}
