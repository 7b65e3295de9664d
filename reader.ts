import { TextDecoder } from 'util';
import { InvalidCount, InvalidText, TruncatedInput, UnknownVariant } from './errors';

export type Float2 = [number, number];
export type Float3 = [number, number, number];
export type Float4 = [number, number, number, number];

export type TextEncoding = 'utf16le' | 'utf8';
export type IndexSize = 1 | 2 | 4;

/** Decodes one index of a width fixed when the reader was created. */
export type IndexReader = () => number;

const decoders: Record<TextEncoding, TextDecoder> = {
	utf16le: new TextDecoder('utf-16le', { fatal: true, ignoreBOM: true }),
	utf8: new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }),
};

/**
 * Every read checks the remaining length first and throws TruncatedInput
 * at the current offset instead of letting Buffer throw a RangeError.
 */
export class BufferReader {
	public readonly bin: Buffer;
	private position: number;

	constructor(bin: Uint8Array, position: number = 0) {
		this.bin = Buffer.isBuffer(bin) ? bin : Buffer.from(bin.buffer, bin.byteOffset, bin.byteLength);
		this.position = position;
	}
	pos(): number {
		return this.position;
	}
	remaining(): number {
		return this.bin.length - this.position;
	}
	ensure(size: number) {
		if (size > this.remaining()) {
			throw new TruncatedInput(this.position, size - this.remaining());
		}
	}
	ahead(size: number): number {
		this.ensure(size);
		var result = this.position;
		this.position += size;
		return result;
	}
	readByte(): number {
		return this.bin.readUInt8(this.ahead(1));
	}
	readInt8(): number {
		return this.bin.readInt8(this.ahead(1));
	}
	readShort(): number {
		return this.bin.readUInt16LE(this.ahead(2));
	}
	readInt16(): number {
		return this.bin.readInt16LE(this.ahead(2));
	}
	readInt(): number {
		return this.bin.readInt32LE(this.ahead(4));
	}
	readUInt(): number {
		return this.bin.readUInt32LE(this.ahead(4));
	}
	readFloat(): number {
		return this.bin.readFloatLE(this.ahead(4));
	}
	readFloat2(): Float2 {
		return [this.readFloat(), this.readFloat()];
	}
	readFloat3(): Float3 {
		return [this.readFloat(), this.readFloat(), this.readFloat()];
	}
	readFloat4(): Float4 {
		return [this.readFloat(), this.readFloat(), this.readFloat(), this.readFloat()];
	}
	readBool(): boolean {
		return this.readByte() !== 0;
	}

	/**
	 * 4-byte byte length followed by the text bytes. Decoding is strict: a
	 * malformed sequence fails instead of turning into U+FFFD.
	 */
	readText(encoding: TextEncoding): string {
		var start = this.position;
		var textlen = this.readInt();
		if (textlen < 0) {
			throw new InvalidCount('text', textlen, start);
		}
		if (encoding === 'utf16le' && textlen % 2 !== 0) {
			throw new InvalidText(start, `odd UTF-16LE byte length ${textlen}`);
		}
		var begin = this.ahead(textlen);
		try {
			return decoders[encoding].decode(this.bin.subarray(begin, begin + textlen));
		} catch (err) {
			throw new InvalidText(begin, err instanceof Error ? err.message : String(err));
		}
	}

	/**
	 * Returns a reader for indices of the given width. Signed indices use -1
	 * as "none"; unsigned ones (vertex indices) have no sentinel.
	 */
	sizedIndex(size: IndexSize, signed: boolean = true): IndexReader {
		switch (size) {
		case 1:
			return signed ? () => this.readInt8() : () => this.readByte();
		case 2:
			return signed ? () => this.readInt16() : () => this.readShort();
		case 4:
			return signed ? () => this.readInt() : () => this.readUInt();
		}
	}

	/**
	 * Reads a record count. `minSize` is the smallest encoding of one
	 * record; a count that cannot fit in the rest of the buffer is reported
	 * as truncation before anything is decoded.
	 */
	readCount(section: string, minSize: number): number {
		var start = this.position;
		var count = this.readInt();
		if (count < 0) {
			throw new InvalidCount(section, count, start);
		}
		this.ensure(count * minSize);
		return count;
	}

	/** One-byte discriminant looked up in `names`; unknown values throw. */
	readTag<T extends string>(context: string, names: readonly T[]): T {
		var start = this.position;
		var tag = this.readByte();
		if (tag >= names.length) {
			throw new UnknownVariant(context, tag, start);
		}
		return names[tag];
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
