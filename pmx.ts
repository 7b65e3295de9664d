/**
 * PMX is the model format of MikuMikuDance, derived from PMD and supported by PMXEditor.
 *
 * The parser takes the whole file as bytes, reads every section in file
 * order and cross-checks the indices between sections. It either returns a
 * complete document or throws a single PmxError; nothing partial escapes.
 */

import { Bone } from './bone';
import { InvalidCount, PmxError, ReferenceErrors } from './errors';
import type { SectionName } from './errors';
import { Frame } from './frame';
import { Header, PmxReader } from './header';
import { Material } from './material';
import { Morph } from './morph';
import { Joint, RigidBody, SoftBody } from './physics';
import { BufferReader } from './reader';
import { findReferenceErrors } from './validator';
import type { ReferenceMode } from './validator';
import { Face, Vertex, readTexturePath } from './vertex';

export interface ParseOptions {
	/** `first` stops at the first dangling index, `all` reports every one. Defaults to `first`. */
	references?: ReferenceMode;
	/** Called after each section with its record count and the offset where it ended. */
	onSection?: (section: SectionName, count: number, offset: number) => void;
}

export type ParseResult =
	| { ok: true; pmx: Pmx }
	| { ok: false; error: PmxError };

function readSection<T>(reader: PmxReader, section: SectionName, minSize: number, read: (reader: PmxReader) => T, options: ParseOptions): T[] {
	var len = reader.readCount(section, minSize);
	var list: T[] = [];
	for (var i = 0; i < len; i++) {
		list.push(read(reader));
	}
	options.onSection?.(section, len, reader.pos());
	return list;
}

function readFaces(reader: PmxReader, options: ParseOptions): Face[] {
	var start = reader.pos();
	// 4 : int | number of vertex indices, three per face
	var faceLen = reader.readCount('Face', reader.header.vertex_size);
	if (faceLen % 3 !== 0) {
		throw new InvalidCount('Face', faceLen, start);
	}
	var faces: Face[] = [];
	for (var i = 0; i < faceLen / 3; i++) {
		faces.push(new Face(reader));
	}
	options.onSection?.('Face', faces.length, reader.pos());
	return faces;
}

export class Pmx {
	public header: Header;
	public vertices: Vertex[];
	public faces: Face[];
	public textures: string[];
	public materials: Material[];
	public bones: Bone[];
	public morphs: Morph[];
	public frames: Frame[];
	public rigids: RigidBody[];
	public joints: Joint[];
	/** PMX 2.1 only; always empty for 2.0 files */
	public soft_bodies: SoftBody[] = [];

	constructor(bin: Uint8Array, options: ParseOptions = {}) {
		var head = new BufferReader(bin);
		this.header = new Header(head);
		var reader = new PmxReader(bin, head.pos(), this.header);
		options.onSection?.('Header', 1, reader.pos());

		this.vertices = readSection(reader, 'Vertex', Vertex.minSize(reader), (r) => new Vertex(r), options);
		this.faces = readFaces(reader, options);
		this.textures = readSection(reader, 'Texture', 4, readTexturePath, options);
		this.materials = readSection(reader, 'Material', Material.minSize(reader), (r) => new Material(r), options);
		this.bones = readSection(reader, 'Bone', Bone.minSize(reader), (r) => new Bone(r), options);
		this.morphs = readSection(reader, 'Morph', Morph.minSize(), (r) => new Morph(r), options);
		this.frames = readSection(reader, 'DisplayFrame', Frame.minSize(), (r) => new Frame(r), options);
		this.rigids = readSection(reader, 'RigidBody', RigidBody.minSize(reader), (r) => new RigidBody(r), options);
		this.joints = readSection(reader, 'Joint', Joint.minSize(reader), (r) => new Joint(r), options);
		if (this.header.version >= 2.1) {
			this.soft_bodies = readSection(reader, 'SoftBody', SoftBody.minSize(reader), (r) => new SoftBody(r), options);
		}

		var mode = options.references ?? 'first';
		var violations = findReferenceErrors(this, mode);
		if (violations.length > 0) {
			throw mode === 'first' ? violations[0] : new ReferenceErrors(violations);
		}
	}
}

export class Parser {
	/** Parses a complete PMX file. Throws a PmxError on the first problem found. */
	static parse(bin: Uint8Array, options?: ParseOptions): Pmx {
		return new Pmx(bin, options);
	}

	static tryParse(bin: Uint8Array, options?: ParseOptions): ParseResult {
		try {
			return { ok: true, pmx: new Pmx(bin, options) };
		} catch (err) {
			if (err instanceof PmxError) {
				return { ok: false, error: err };
			}
			throw err;
		}
	}
}

/**
 * Human readable overview of a parsed model: version, names and the size
 * of every section.
 */
export function summarize(pmx: Pmx): string {
	var h = pmx.header;
	var lines = [
		`PMX v${h.version.toFixed(1)} (${h.encoding})`,
		`  model name: ${h.model_name}`,
		`  model name (en): ${h.model_name_en}`,
		`  comment: ${h.comment}`,
		`  comment (en): ${h.comment_en}`,
		`  vertices: ${pmx.vertices.length}`,
		`  faces: ${pmx.faces.length}`,
		`  textures: ${pmx.textures.length}`,
		`  materials: ${pmx.materials.length}`,
		`  bones: ${pmx.bones.length}`,
		`  morphs: ${pmx.morphs.length}`,
		`  frames: ${pmx.frames.length}`,
		`  rigid bodies: ${pmx.rigids.length}`,
		`  joints: ${pmx.joints.length}`,
	];
	if (h.version >= 2.1) {
		lines.push(`  soft bodies: ${pmx.soft_bodies.length}`);
	}
	return lines.join('\n');
}

export * from './errors';
export { Header } from './header';
export type { Float2, Float3, Float4, TextEncoding, IndexSize } from './reader';
export { Vertex, Face } from './vertex';
export type { Skin, SkinType } from './vertex';
export { Material } from './material';
export type { MaterialFlags, SphereMode, Toon } from './material';
export { Bone } from './bone';
export type { BoneFlags, BoneTail, BoneInherit, Ik, IkLink } from './bone';
export { Morph } from './morph';
export type { MorphOffsets, MorphPanel, MorphType, MaterialOperation } from './morph';
export { Frame } from './frame';
export type { FrameItem } from './frame';
export { RigidBody, Joint, SoftBody } from './physics';
export type { RigidShape, RigidMode, JointType, SoftShape, AeroModel, SoftAnchor } from './physics';
export type { ReferenceMode } from './validator';

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
