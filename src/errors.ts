export type SettingsTreeErrorCode =
	| 'MalformedSignature'
	| 'TypeMismatch'
	| 'ValueCoercion'
	| 'StructuralMismatch'
	| 'IndexOutOfRange'
	| 'PersistenceRejected';

export abstract class SettingsTreeError extends Error {
	abstract readonly code: SettingsTreeErrorCode;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class MalformedSignatureError extends SettingsTreeError {
	readonly code = 'MalformedSignature';

	constructor(
		public readonly signature: string,
		public readonly position: number,
		reason: string
	) {
		super(`Malformed type signature '${signature}' at ${position}: ${reason}`);
	}
}

export class TypeMismatchError extends SettingsTreeError {
	readonly code = 'TypeMismatch';

	constructor(
		public readonly expected: string,
		public readonly actual: string
	) {
		super(`Expected a value of type '${expected}', got '${actual}'.`);
	}
}

export class ValueCoercionError extends SettingsTreeError {
	readonly code = 'ValueCoercion';

	constructor(
		public readonly text: string,
		public readonly target: string,
		reason?: string
	) {
		super(`Cannot convert '${text}' to ${target}${reason ? `: ${reason}` : '.'}`);
	}
}

export class StructuralMismatchError extends SettingsTreeError {
	readonly code = 'StructuralMismatch';
}

export class IndexOutOfRangeError extends SettingsTreeError {
	readonly code = 'IndexOutOfRange';

	constructor(
		public readonly index: number,
		public readonly length: number
	) {
		super(`Index ${index} is out of range for a default of ${length} element(s).`);
	}
}

export class PersistenceRejectedError extends SettingsTreeError {
	readonly code = 'PersistenceRejected';

	constructor(public readonly reason: string) {
		super(reason);
	}
}

export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	return String(error);
}
