import { describe, expect, it } from 'vitest';
import { InvalidCount, InvalidGlobal, MalformedHeader, TruncatedInput, UnsupportedVersion } from '../errors';
import { Header } from '../header';
import { BufferReader } from '../reader';
import { PmxBuilder, Writer, catchError } from './builder';

function readHeader(bin: Uint8Array): Header {
	return new Header(new BufferReader(bin));
}

/** signature, version 2.0, then the given globals and four empty UTF-8 texts */
function rawHeader(globals: number[], count: number = globals.length): Buffer {
	return new Writer().ascii('PMX ').float(2.0).byte(count).bytes(...globals).int(0).int(0).int(0).int(0).build();
}

describe('Header', () => {
	it('reads the globals and texts', () => {
		var header = readHeader(new PmxBuilder({
			version: 2.1,
			uv_append: 2,
			vertex_size: 2,
			bone_size: 4,
			model_name: 'model',
			comment: 'line1\nline2',
		}).build());
		expect(header).toEqual({
			signature: 'PMX ',
			version: 2.1,
			encoding: 'utf8',
			uv_append: 2,
			vertex_size: 2,
			texture_size: 1,
			material_size: 1,
			bone_size: 4,
			morph_size: 1,
			rigidbody_size: 1,
			model_name: 'model',
			model_name_en: '',
			comment: 'line1\nline2',
			comment_en: '',
		});
	});

	it('decodes UTF-16LE names', () => {
		var header = readHeader(new PmxBuilder({ encoding: 'utf16le', model_name: 'テスト', comment: 'コメント' }).build());
		expect(header.encoding).toBe('utf16le');
		expect(header.model_name).toBe('テスト');
		expect(header.comment).toBe('コメント');
	});

	it('skips globals beyond the eighth', () => {
		var header = readHeader(new PmxBuilder({ extra_globals: 2, model_name: 'extra' }).build());
		expect(header.model_name).toBe('extra');
		expect(header.rigidbody_size).toBe(1);
	});

	it('rejects a foreign signature', () => {
		var error = catchError(() => readHeader(new Writer().ascii('PMD ').float(2.0).build()));
		expect(error).toBeInstanceOf(MalformedHeader);
		expect(error).toMatchObject({ kind: 'MalformedHeader', signature: 'PMD ', offset: 0 });
	});

	it('reports an empty file as truncated', () => {
		var error = catchError(() => readHeader(new Uint8Array(0)));
		expect(error).toBeInstanceOf(TruncatedInput);
		expect(error).toMatchObject({ offset: 0, needed: 4 });
	});

	it('rejects other versions', () => {
		var error = catchError(() => readHeader(new Writer().ascii('PMX ').float(3.0).build()));
		expect(error).toBeInstanceOf(UnsupportedVersion);
		expect(error).toMatchObject({ found: 3, offset: 4 });
		expect(error?.message).toBe('PMX version 3 is not supported');
	});

	it('rejects fewer than eight globals', () => {
		var error = catchError(() => readHeader(rawHeader([1, 0, 1, 1, 1, 1, 1], 7)));
		expect(error).toBeInstanceOf(InvalidCount);
		expect(error).toMatchObject({ section: 'globals', value: 7, offset: 8 });
	});

	it.each([
		{ name: 'text encoding', globals: [2, 0, 1, 1, 1, 1, 1, 1], index: 0, value: 2, offset: 9 },
		{ name: 'additional uv count', globals: [1, 5, 1, 1, 1, 1, 1, 1], index: 1, value: 5, offset: 10 },
		{ name: 'vertex index size', globals: [1, 0, 0, 1, 1, 1, 1, 1], index: 2, value: 0, offset: 11 },
		{ name: 'bone index size', globals: [1, 0, 1, 1, 1, 3, 1, 1], index: 5, value: 3, offset: 14 },
		{ name: 'rigid body index size', globals: [1, 0, 1, 1, 1, 1, 1, 8], index: 7, value: 8, offset: 16 },
	])('rejects an invalid $name', ({ globals, index, value, offset }) => {
		var error = catchError(() => readHeader(rawHeader(globals)));
		expect(error).toBeInstanceOf(InvalidGlobal);
		expect(error).toMatchObject({ kind: 'InvalidGlobal', index, value, offset });
	});
});

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
