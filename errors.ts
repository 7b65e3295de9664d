/**
 * Every failure of the parser is one of the classes below. `kind` is the
 * discriminant, `offset` the byte position where decoding stopped
 * (-1 for checks that run after the whole file was read).
 */

export type SectionName =
	| 'Header'
	| 'Vertex'
	| 'Face'
	| 'Texture'
	| 'Material'
	| 'InternalToon'
	| 'Bone'
	| 'Morph'
	| 'DisplayFrame'
	| 'RigidBody'
	| 'Joint'
	| 'SoftBody';

export type PmxErrorKind =
	| 'TruncatedInput'
	| 'MalformedHeader'
	| 'UnsupportedVersion'
	| 'InvalidGlobal'
	| 'InvalidCount'
	| 'UnknownVariant'
	| 'InvalidText'
	| 'DanglingReference'
	| 'SelfReference'
	| 'ReferenceErrors';

export abstract class PmxError extends Error {
	abstract readonly kind: PmxErrorKind;
	constructor(message: string, public readonly offset: number) {
		super(message);
		this.name = new.target.name;
	}
}

export class TruncatedInput extends PmxError {
	readonly kind = 'TruncatedInput';
	constructor(offset: number, public readonly needed: number) {
		super(`unexpected end of input at offset ${offset} (${needed} more bytes needed)`, offset);
	}
}

export class MalformedHeader extends PmxError {
	readonly kind = 'MalformedHeader';
	constructor(public readonly signature: string) {
		super(`${JSON.stringify(signature)} is not a PMX signature`, 0);
	}
}

export class UnsupportedVersion extends PmxError {
	readonly kind = 'UnsupportedVersion';
	constructor(public readonly found: number) {
		super(`PMX version ${found} is not supported`, 4);
	}
}

export class InvalidGlobal extends PmxError {
	readonly kind = 'InvalidGlobal';
	constructor(public readonly index: number, public readonly value: number, offset: number) {
		super(`invalid header global ${value} at index ${index}`, offset);
	}
}

export class InvalidCount extends PmxError {
	readonly kind = 'InvalidCount';
	constructor(public readonly section: string, public readonly value: number, offset: number) {
		super(`invalid ${section} count ${value} at offset ${offset}`, offset);
	}
}

export class UnknownVariant extends PmxError {
	readonly kind = 'UnknownVariant';
	constructor(public readonly context: string, public readonly tag: number, offset: number) {
		super(`unknown ${context} ${tag} at offset ${offset}`, offset);
	}
}

export class InvalidText extends PmxError {
	readonly kind = 'InvalidText';
	constructor(offset: number, reason: string) {
		super(`invalid text at offset ${offset}: ${reason}`, offset);
	}
}

export class DanglingReference extends PmxError {
	readonly kind = 'DanglingReference';
	constructor(
		public readonly section: SectionName,
		public readonly record_index: number,
		public readonly target_section: SectionName,
		public readonly value: number,
	) {
		super(`${section}[${record_index}] refers to ${target_section} ${value}, which does not exist`, -1);
	}
}

export class SelfReference extends PmxError {
	readonly kind = 'SelfReference';
	readonly section: SectionName = 'Morph';
	constructor(public readonly record_index: number) {
		super(`group morph ${record_index} refers to itself`, -1);
	}
}

export type ReferenceViolation = DanglingReference | SelfReference;

export class ReferenceErrors extends PmxError {
	readonly kind = 'ReferenceErrors';
	constructor(public readonly violations: ReferenceViolation[]) {
		super(`${violations.length} invalid references; first: ${violations[0]?.message}`, -1);
	}
}

// Copyright 2014 KATO Kanryu(k.kanryu@gmail.com)
//
//   Licensed under the Apache License, Version 2.0 (the "License");
//   you may not use this file except in compliance with the License.
//   You may obtain a copy of the License at
//
//       http://www.apache.org/licenses/LICENSE-2.0
//
//   Unless required by applicable law or agreed to in writing, software
//   distributed under the License is distributed on an "AS IS" BASIS,
//   WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
//   See the License for the specific language governing permissions and
//   limitations under the License.
