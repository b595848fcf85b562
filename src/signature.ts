import { MalformedSignatureError } from './errors';

export type IntegerKind = 'byte' | 'int16' | 'uint16' | 'int32' | 'uint32' | 'int64' | 'uint64';

export type StringKind = 'string' | 'objectPath' | 'signature';

export type BasicKind = 'boolean' | IntegerKind | 'double' | StringKind;

export type ContainerKind = 'variant' | 'maybe' | 'array' | 'dictEntryArray' | 'tuple';

export type SignatureKind = BasicKind | ContainerKind;

export interface BasicSignature {
	readonly kind: BasicKind;
	readonly text: string;
}

export interface VariantSignature {
	readonly kind: 'variant';
	readonly text: string;
}

export interface MaybeSignature {
	readonly kind: 'maybe';
	readonly text: string;
	readonly element: TypeSignature;
}

export interface ArraySignature {
	readonly kind: 'array';
	readonly text: string;
	readonly element: TypeSignature;
}

export interface DictEntryArraySignature {
	readonly kind: 'dictEntryArray';
	readonly text: string;
	readonly key: BasicSignature;
	readonly value: TypeSignature;
}

export interface TupleSignature {
	readonly kind: 'tuple';
	readonly text: string;
	readonly elements: readonly TypeSignature[];
}

export type TypeSignature =
	| BasicSignature
	| VariantSignature
	| MaybeSignature
	| ArraySignature
	| DictEntryArraySignature
	| TupleSignature;

const BASIC_CODES: Record<string, BasicKind> = {
	b: 'boolean',
	y: 'byte',
	n: 'int16',
	q: 'uint16',
	i: 'int32',
	u: 'uint32',
	x: 'int64',
	t: 'uint64',
	d: 'double',
	s: 'string',
	o: 'objectPath',
	g: 'signature'
};

const BASIC_TEXT: Record<BasicKind, string> = {
	boolean: 'b',
	byte: 'y',
	int16: 'n',
	uint16: 'q',
	int32: 'i',
	uint32: 'u',
	int64: 'x',
	uint64: 't',
	double: 'd',
	string: 's',
	objectPath: 'o',
	signature: 'g'
};

export function isBasicKind(kind: SignatureKind): kind is BasicKind {
	return kind in BASIC_TEXT;
}

export function isContainerKind(kind: SignatureKind): kind is ContainerKind {
	return !isBasicKind(kind);
}

export function isBasicSignature(signature: TypeSignature): signature is BasicSignature {
	return isBasicKind(signature.kind);
}

export function basicSignature(kind: BasicKind): BasicSignature {
	return { kind, text: BASIC_TEXT[kind] };
}

export function parseSignature(text: string): TypeSignature {
	const scanner = new SignatureScanner(text);
	const signature = scanner.readType();
	scanner.expectEnd();
	return signature;
}

// A concatenation of complete types, as carried by a 'g' value.
export function parseSignatureList(text: string): TypeSignature[] {
	const scanner = new SignatureScanner(text);
	const result: TypeSignature[] = [];
	while (!scanner.atEnd()) {
		result.push(scanner.readType());
	}

	return result;
}

export function formatSignature(signature: TypeSignature): string {
	switch (signature.kind) {
		case 'variant':
			return 'v';
		case 'maybe':
			return `m${formatSignature(signature.element)}`;
		case 'array':
			return `a${formatSignature(signature.element)}`;
		case 'dictEntryArray':
			return `a{${formatSignature(signature.key)}${formatSignature(signature.value)}}`;
		case 'tuple':
			return `(${signature.elements.map(formatSignature).join('')})`;
		default:
			return BASIC_TEXT[signature.kind];
	}
}

export function signatureEquals(a: TypeSignature, b: TypeSignature): boolean {
	return formatSignature(a) === formatSignature(b);
}

const MAX_SIGNATURE_LENGTH = 255;
const MAX_CONTAINER_DEPTH = 64;

class SignatureScanner {
	private position = 0;
	private depth = 0;

	constructor(private readonly text: string) {
		if (text.length > MAX_SIGNATURE_LENGTH) {
			this.fail(`longer than ${MAX_SIGNATURE_LENGTH} characters`, MAX_SIGNATURE_LENGTH);
		}
	}

	atEnd(): boolean {
		return this.position >= this.text.length;
	}

	expectEnd(): void {
		if (!this.atEnd()) {
			return this.fail(`unexpected trailing '${this.text.slice(this.position)}'`);
		}
	}

	readType(): TypeSignature {
		const start = this.position;
		const code = this.next();

		const basic = BASIC_CODES[code];
		if (basic) {
			return { kind: basic, text: code };
		}

		switch (code) {
			case 'v':
			case '@':
				return { kind: 'variant', text: code };
			case 'm':
			case 'a':
			case '(': {
				this.depth += 1;
				if (this.depth > MAX_CONTAINER_DEPTH) {
					return this.fail(`containers nested deeper than ${MAX_CONTAINER_DEPTH} levels`, start);
				}

				const container = this.readContainer(code, start);
				this.depth -= 1;
				return container;
			}
			case '':
				return this.fail('signature ended early', start);
			default:
				return this.fail(`unrecognized type code '${code}'`, start);
		}
	}

	private readContainer(code: string, start: number): TypeSignature {
		if (code === 'm') {
			const element = this.readType();
			return { kind: 'maybe', text: this.slice(start), element };
		}

		if (code === '(') {
			return this.readTuple(start);
		}

		if (this.peek() === '{') {
			return this.readDictEntryArray(start);
		}

		return { kind: 'array', text: this.slice(start), element: this.readType() };
	}

	private readDictEntryArray(start: number): DictEntryArraySignature {
		this.position += 1;
		const keyStart = this.position;
		const key = this.readType();
		if (!isBasicSignature(key)) {
			return this.fail('dictionary keys must be basic types', keyStart);
		}

		const value = this.readType();
		if (this.next() !== '}') {
			return this.fail("expected '}'", this.position - 1);
		}

		return { kind: 'dictEntryArray', text: this.slice(start), key, value };
	}

	private readTuple(start: number): TupleSignature {
		const elements: TypeSignature[] = [];
		while (this.peek() !== ')') {
			if (this.atEnd()) {
				return this.fail("expected ')'");
			}

			elements.push(this.readType());
		}

		this.position += 1;
		return { kind: 'tuple', text: this.slice(start), elements };
	}

	private next(): string {
		const code = this.text.charAt(this.position);
		if (code) {
			this.position += 1;
		}

		return code;
	}

	private peek(): string {
		return this.text.charAt(this.position);
	}

	private slice(start: number): string {
		return this.text.slice(start, this.position);
	}

	private fail(reason: string, position = this.position): never {
		throw new MalformedSignatureError(this.text, position, reason);
	}
}
