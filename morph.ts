import type { PmxReader } from './header';
import type { Float3, Float4 } from './reader';

export type MorphPanel = 'system' | 'eyebrow' | 'eye' | 'mouth' | 'other';
// 0:system 1:eyebrow (bottom left) 2:eye (top left) 3:mouth (top right) 4:other (bottom right)
const MORPH_PANELS: readonly MorphPanel[] = ['system', 'eyebrow', 'eye', 'mouth', 'other'];

type MorphKind = 'group' | 'vertex' | 'bone' | 'uv' | 'uv1' | 'uv2' | 'uv3' | 'uv4' | 'material' | 'flip' | 'impulse';
const MORPH_KINDS: readonly MorphKind[] = ['group', 'vertex', 'bone', 'uv', 'uv1', 'uv2', 'uv3', 'uv4', 'material', 'flip', 'impulse'];

export type MaterialOperation = 'multiply' | 'add';
const MATERIAL_OPERATIONS: readonly MaterialOperation[] = ['multiply', 'add'];

export interface GroupOffset {
	morph_idx: number;
	rate: number;
}

export interface VertexOffset {
	vertex_idx: number;
	offset: Float3;
}

export interface BoneOffset {
	bone_idx: number;
	translation: Float3;
	/** quaternion (x,y,z,w) */
	rotation: Float4;
}

export interface UvOffset {
	vertex_idx: number;
	/** z,w are unused for the base UV but kept as stored */
	offset: Float4;
}

export interface MaterialOffset {
	/** -1 targets every material */
	material_idx: number;
	operation: MaterialOperation;
	diffuse: Float4;
	specular: Float3;
	specular_mod: number;
	ambient: Float3;
	edge_color: Float4;
	edge_size: number;
	texture_mod: Float4;
	sphere_mod: Float4;
	toon_mod: Float4;
}

export interface ImpulseOffset {
	rigid_idx: number;
	local: boolean;
	velocity: Float3;
	torque: Float3;
}

/** Offsets of one morph; the record layout depends on the morph type. */
export type MorphOffsets =
	| { type: 'group'; items: GroupOffset[] }
	| { type: 'vertex'; items: VertexOffset[] }
	| { type: 'bone'; items: BoneOffset[] }
	| { type: 'uv'; /** 0 is the base UV, 1..4 the additional UVs */ uv_channel: number; items: UvOffset[] }
	| { type: 'material'; items: MaterialOffset[] }
	| { type: 'flip'; items: GroupOffset[] }
	| { type: 'impulse'; items: ImpulseOffset[] };

export type MorphType = MorphOffsets['type'];

function readList<T>(reader: PmxReader, minSize: number, read: () => T): T[] {
	var count = reader.readCount('morph offset', minSize);
	var items: T[] = [];
	for (var i = 0; i < count; i++) {
		items.push(read());
	}
	return items;
}

function readGroupOffset(reader: PmxReader): GroupOffset {
	return { morph_idx: reader.morphIdx(), rate: reader.readFloat() };
}

function readMaterialOffset(reader: PmxReader): MaterialOffset {
	return {
		material_idx: reader.materialIdx(),
		operation: reader.readTag('material morph operation', MATERIAL_OPERATIONS),
		diffuse: reader.readFloat4(),
		specular: reader.readFloat3(),
		specular_mod: reader.readFloat(),
		ambient: reader.readFloat3(),
		edge_color: reader.readFloat4(),
		edge_size: reader.readFloat(),
		texture_mod: reader.readFloat4(),
		sphere_mod: reader.readFloat4(),
		toon_mod: reader.readFloat4(),
	};
}

function readOffsets(reader: PmxReader, kind: MorphKind): MorphOffsets {
	var h = reader.header;
	switch (kind) {
	case 'group':
		return { type: 'group', items: readList(reader, h.morph_size + 4, () => readGroupOffset(reader)) };
	case 'vertex':
		return {
			type: 'vertex',
			items: readList(reader, h.vertex_size + 12, () => ({ vertex_idx: reader.vertexIdx(), offset: reader.readFloat3() })),
		};
	case 'bone':
		return {
			type: 'bone',
			items: readList(reader, h.bone_size + 28, () => ({
				bone_idx: reader.boneIdx(),
				translation: reader.readFloat3(),
				rotation: reader.readFloat4(),
			})),
		};
	case 'uv':
	case 'uv1':
	case 'uv2':
	case 'uv3':
	case 'uv4':
		return {
			type: 'uv',
			uv_channel: MORPH_KINDS.indexOf(kind) - MORPH_KINDS.indexOf('uv'),
			items: readList(reader, h.vertex_size + 16, () => ({ vertex_idx: reader.vertexIdx(), offset: reader.readFloat4() })),
		};
	case 'material':
		return { type: 'material', items: readList(reader, h.material_size + 113, () => readMaterialOffset(reader)) };
	case 'flip':
		return { type: 'flip', items: readList(reader, h.morph_size + 4, () => readGroupOffset(reader)) };
	case 'impulse':
		return {
			type: 'impulse',
			items: readList(reader, h.rigidbody_size + 25, () => ({
				rigid_idx: reader.rigidIdx(),
				local: reader.readBool(),
				velocity: reader.readFloat3(),
				torque: reader.readFloat3(),
			})),
		};
	}
}

/**
 * Morph
 */
export class Morph {
	public name: string;
	public name_en: string;
	public panel: MorphPanel;
	public offsets: MorphOffsets;

	static minSize(): number {
		return 8 + 1 + 1 + 4;
	}

	constructor(reader: PmxReader) {
		this.name = reader.text();
		this.name_en = reader.text();
		// 1  : byte	| control panel (PMD: category)
		this.panel = reader.readTag('morph panel', MORPH_PANELS);
		// 1  : byte	| morph type, 4..7 are additional UV1..4, 9 and 10 are PMX 2.1
		var kind = reader.readTag('morph type', MORPH_KINDS);
		// 4  : int  	| offset count, then the offsets
		this.offsets = readOffsets(reader, kind);
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
