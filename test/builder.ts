import type { IndexSize, TextEncoding } from '../reader';

/**
 * Little-endian byte writer used to assemble PMX files for the tests.
 */
export class Writer {
	private parts: Buffer[] = [];

	constructor(public encoding: TextEncoding = 'utf8') {}

	private push(size: number, write: (buf: Buffer) => void): this {
		var buf = Buffer.alloc(size);
		write(buf);
		this.parts.push(buf);
		return this;
	}
	bytes(...values: number[]): this {
		this.parts.push(Buffer.from(values));
		return this;
	}
	ascii(text: string): this {
		this.parts.push(Buffer.from(text, 'latin1'));
		return this;
	}
	byte(value: number): this {
		return this.push(1, (b) => b.writeUInt8(value));
	}
	u16(value: number): this {
		return this.push(2, (b) => b.writeUInt16LE(value));
	}
	int(value: number): this {
		return this.push(4, (b) => b.writeInt32LE(value));
	}
	float(...values: number[]): this {
		values.forEach((v) => this.push(4, (b) => b.writeFloatLE(v)));
		return this;
	}
	text(value: string): this {
		var buf = Buffer.from(value, this.encoding);
		this.int(buf.length);
		this.parts.push(buf);
		return this;
	}
	index(size: IndexSize, value: number, signed: boolean = true): this {
		switch (size) {
		case 1:
			return this.push(1, (b) => (signed ? b.writeInt8(value) : b.writeUInt8(value)));
		case 2:
			return this.push(2, (b) => (signed ? b.writeInt16LE(value) : b.writeUInt16LE(value)));
		case 4:
			return this.push(4, (b) => (signed ? b.writeInt32LE(value) : b.writeUInt32LE(value)));
		}
	}
	build(): Buffer {
		return Buffer.concat(this.parts);
	}
}

export interface HeaderOptions {
	version?: number;
	encoding?: TextEncoding;
	uv_append?: number;
	vertex_size?: IndexSize;
	texture_size?: IndexSize;
	material_size?: IndexSize;
	bone_size?: IndexSize;
	morph_size?: IndexSize;
	rigidbody_size?: IndexSize;
	/** count of extra globals appended after the standard eight */
	extra_globals?: number;
	model_name?: string;
	model_name_en?: string;
	comment?: string;
	comment_en?: string;
}

export interface MaterialOptions {
	flags?: number;
	texture?: number;
	sphere?: number;
	sphere_mode?: number;
	/** shared toon flag followed by its value */
	toon?: [number, number];
}

/**
 * Writer that knows the header's index widths, so records can be written
 * with `b.bone(0)` the same way the parser reads them.
 */
export class PmxBuilder extends Writer {
	public readonly version: number;
	public readonly uv_append: number;
	public readonly vertex_size: IndexSize;
	public readonly texture_size: IndexSize;
	public readonly material_size: IndexSize;
	public readonly bone_size: IndexSize;
	public readonly morph_size: IndexSize;
	public readonly rigidbody_size: IndexSize;

	constructor(options: HeaderOptions = {}) {
		super(options.encoding ?? 'utf8');
		this.version = options.version ?? 2.0;
		this.uv_append = options.uv_append ?? 0;
		this.vertex_size = options.vertex_size ?? 1;
		this.texture_size = options.texture_size ?? 1;
		this.material_size = options.material_size ?? 1;
		this.bone_size = options.bone_size ?? 1;
		this.morph_size = options.morph_size ?? 1;
		this.rigidbody_size = options.rigidbody_size ?? 1;
		var extra = options.extra_globals ?? 0;

		this.ascii('PMX ').float(this.version);
		this.byte(8 + extra);
		this.bytes(
			this.encoding === 'utf8' ? 1 : 0,
			this.uv_append,
			this.vertex_size,
			this.texture_size,
			this.material_size,
			this.bone_size,
			this.morph_size,
			this.rigidbody_size,
		);
		for (var i = 0; i < extra; i++) {
			this.byte(0);
		}
		this.text(options.model_name ?? 'test');
		this.text(options.model_name_en ?? '');
		this.text(options.comment ?? '');
		this.text(options.comment_en ?? '');
	}

	vertexIdx(value: number): this {
		return this.index(this.vertex_size, value, false);
	}
	textureIdx(value: number): this {
		return this.index(this.texture_size, value);
	}
	materialIdx(value: number): this {
		return this.index(this.material_size, value);
	}
	boneIdx(value: number): this {
		return this.index(this.bone_size, value);
	}
	morphIdx(value: number): this {
		return this.index(this.morph_size, value);
	}
	rigidIdx(value: number): this {
		return this.index(this.rigidbody_size, value);
	}

	/** position, normal (0,1,0), uv and zeroed additional uvs */
	vertexBase(pos: [number, number, number] = [0, 0, 0]): this {
		this.float(...pos, 0, 1, 0, 0, 0);
		for (var i = 0; i < this.uv_append; i++) {
			this.float(0, 0, 0, 0);
		}
		return this;
	}
	/** BDEF1 vertex with edge scale 1 */
	vertex(bone: number = 0): this {
		return this.vertexBase().byte(0).boneIdx(bone).float(1);
	}
	face(a: number, b: number, c: number): this {
		return this.vertexIdx(a).vertexIdx(b).vertexIdx(c);
	}
	/** bone with no optional parts and a (0,1,0) tail offset */
	bone(name: string, parent: number = -1): this {
		return this.text(name).text('').float(0, 0, 0).boneIdx(parent).int(0).u16(0).float(0, 1, 0);
	}
	material(name: string, options: MaterialOptions = {}): this {
		this.text(name).text('');
		this.float(1, 1, 1, 1).float(0, 0, 0).float(5).float(0.5, 0.5, 0.5);
		this.byte(options.flags ?? 0);
		this.float(0, 0, 0, 1).float(1);
		this.textureIdx(options.texture ?? -1).textureIdx(options.sphere ?? -1);
		this.byte(options.sphere_mode ?? 0);
		var [flag, value] = options.toon ?? [1, 0];
		this.byte(flag);
		if (flag === 0) {
			this.textureIdx(value);
		} else if (flag === 1) {
			this.byte(value);
		}
		return this.text('').int(3);
	}
	/** sphere rigid body of radius 0.5 */
	rigid(name: string, bone: number = -1): this {
		this.text(name).text('').boneIdx(bone).byte(0).u16(0xffff).byte(0);
		this.float(0.5, 0, 0).float(0, 0, 0).float(0, 0, 0);
		return this.float(1, 0.5, 0.5, 0, 0.5).byte(0);
	}
	/** triangle mesh soft body with zeroed parameters, one anchor and one pin */
	softBody(name: string, material: number, rigid: number, vertex: number): this {
		this.text(name).text('').byte(0).materialIdx(material).byte(0).u16(0).byte(0);
		this.int(0).int(0).float(0).float(0).int(0);
		for (var i = 0; i < 18; i++) {
			this.float(0);
		}
		this.int(0).int(0).int(0).int(0).float(0, 0, 0);
		this.int(1).rigidIdx(rigid).vertexIdx(vertex).byte(0);
		return this.int(1).vertexIdx(vertex);
	}
	/** joint with every vector zeroed */
	joint(name: string, type: number, a: number, b: number): this {
		this.text(name).text('').byte(type).rigidIdx(a).rigidIdx(b);
		for (var i = 0; i < 8; i++) {
			this.float(0, 0, 0);
		}
		return this;
	}
}

export type SectionWriter = (b: PmxBuilder) => void;

export interface Sections {
	vertices?: SectionWriter;
	faces?: SectionWriter;
	textures?: SectionWriter;
	materials?: SectionWriter;
	bones?: SectionWriter;
	morphs?: SectionWriter;
	frames?: SectionWriter;
	rigids?: SectionWriter;
	joints?: SectionWriter;
	soft_bodies?: SectionWriter;
}

const empty: SectionWriter = (b) => {
	b.int(0);
};

/**
 * A complete file: one BDEF1 vertex on bone 0, one face (0,0,0) and one
 * root bone named "center" unless a section is replaced. Soft bodies are
 * written only for version 2.1.
 */
export function buildModel(header: HeaderOptions = {}, sections: Sections = {}): Buffer {
	var b = new PmxBuilder(header);
	(sections.vertices ?? ((w) => w.int(1).vertex(0)))(b);
	(sections.faces ?? ((w) => w.int(3).face(0, 0, 0)))(b);
	(sections.textures ?? empty)(b);
	(sections.materials ?? empty)(b);
	(sections.bones ?? ((w) => w.int(1).bone('center')))(b);
	(sections.morphs ?? empty)(b);
	(sections.frames ?? empty)(b);
	(sections.rigids ?? empty)(b);
	(sections.joints ?? empty)(b);
	if (b.version === 2.1) {
		(sections.soft_bodies ?? empty)(b);
	}
	return b.build();
}

/** Runs `fn` and returns what it threw, or undefined when it returned. */
export function catchError(fn: () => unknown): Error | undefined {
	try {
		fn();
	} catch (err) {
		if (err instanceof Error) {
			return err;
		}
		throw err;
	}
	return undefined;
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
