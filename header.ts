import { InvalidCount, InvalidGlobal, MalformedHeader, UnsupportedVersion } from './errors';
import { BufferReader } from './reader';
import type { IndexReader, IndexSize, TextEncoding } from './reader';

const SUPPORTED_VERSIONS = [2.0, 2.1];
const INDEX_SIZES: readonly number[] = [1, 2, 4];
const GLOBALS_COUNT = 8;

function isIndexSize(value: number): value is IndexSize {
	return INDEX_SIZES.indexOf(value) >= 0;
}

/**
 * Signature, version, the globals table and the model name/comment texts.
 */
export class Header {
	public signature: string;
	public version: number;
	public encoding: TextEncoding;
	public uv_append: number;
	public vertex_size: IndexSize;
	public texture_size: IndexSize;
	public material_size: IndexSize;
	public bone_size: IndexSize;
	public morph_size: IndexSize;
	public rigidbody_size: IndexSize;
	public model_name: string;
	public model_name_en: string;
	public comment: string;
	public comment_en: string;

	constructor(reader: BufferReader) {
		// 4 : byte[4] | "PMX " (some exporters drop the trailing space)
		var sigPos = reader.ahead(4);
		this.signature = reader.bin.toString('latin1', sigPos, sigPos + 4);
		if (this.signature.slice(0, 3) !== 'PMX') {
			throw new MalformedHeader(this.signature);
		}
		// 4 : float | version 2.0 / 2.1
		var version = reader.readFloat();
		var matched = SUPPORTED_VERSIONS.filter((v) => Math.fround(v) === version);
		if (matched.length === 0) {
			throw new UnsupportedVersion(version);
		}
		this.version = matched[0];

		// 1 : byte | globals count, 8 in PMX 2.x
		var countPos = reader.pos();
		var globals = reader.readByte();
		if (globals < GLOBALS_COUNT) {
			throw new InvalidCount('globals', globals, countPos);
		}
		// 0 : text encoding 0:UTF16LE 1:UTF8
		var encodingPos = reader.pos();
		var encodeId = reader.readByte();
		if (encodeId > 1) {
			throw new InvalidGlobal(0, encodeId, encodingPos);
		}
		this.encoding = encodeId ? 'utf8' : 'utf16le';
		// 1 : additional UV count 0..4
		var uvPos = reader.pos();
		this.uv_append = reader.readByte();
		if (this.uv_append > 4) {
			throw new InvalidGlobal(1, this.uv_append, uvPos);
		}
		// 2..7 : vertex, texture, material, bone, morph, rigid body index sizes
		this.vertex_size = readIndexSize(reader, 2);
		this.texture_size = readIndexSize(reader, 3);
		this.material_size = readIndexSize(reader, 4);
		this.bone_size = readIndexSize(reader, 5);
		this.morph_size = readIndexSize(reader, 6);
		this.rigidbody_size = readIndexSize(reader, 7);
		// globals added by later revisions are skipped
		reader.ahead(globals - GLOBALS_COUNT);

		this.model_name = reader.readText(this.encoding);
		this.model_name_en = reader.readText(this.encoding);
		this.comment = reader.readText(this.encoding);
		this.comment_en = reader.readText(this.encoding);
	}
}

function readIndexSize(reader: BufferReader, index: number): IndexSize {
	var pos = reader.pos();
	var size = reader.readByte();
	if (!isIndexSize(size)) {
		throw new InvalidGlobal(index, size, pos);
	}
	return size;
}

/**
 * Binds the header's encoding and index widths so section records can read
 * `reader.boneIdx()` without knowing how wide a bone index is in this file.
 */
export class PmxReader extends BufferReader {
	public readonly vertexIdx: IndexReader;
	public readonly textureIdx: IndexReader;
	public readonly materialIdx: IndexReader;
	public readonly boneIdx: IndexReader;
	public readonly morphIdx: IndexReader;
	public readonly rigidIdx: IndexReader;

	constructor(bin: Uint8Array, position: number, public readonly header: Header) {
		super(bin, position);
		this.vertexIdx = this.sizedIndex(header.vertex_size, false);
		this.textureIdx = this.sizedIndex(header.texture_size);
		this.materialIdx = this.sizedIndex(header.material_size);
		this.boneIdx = this.sizedIndex(header.bone_size);
		this.morphIdx = this.sizedIndex(header.morph_size);
		this.rigidIdx = this.sizedIndex(header.rigidbody_size);
	}
	text(): string {
		return this.readText(this.header.encoding);
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
