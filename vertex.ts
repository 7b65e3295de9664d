import type { PmxReader } from './header';
import type { Float2, Float3, Float4 } from './reader';

export type Skin =
	| { type: 'bdef1'; bones: [number] }
	| { type: 'bdef2'; bones: [number, number]; weight: number }
	| { type: 'bdef4' | 'qdef'; bones: [number, number, number, number]; weights: Float4 }
	| { type: 'sdef'; bones: [number, number]; weight: number; c: Float3; r0: Float3; r1: Float3 };

export type SkinType = Skin['type'];

// deform type 0:BDEF1 1:BDEF2 2:BDEF4 3:SDEF 4:QDEF(2.1)
const SKIN_TYPES: readonly SkinType[] = ['bdef1', 'bdef2', 'bdef4', 'sdef', 'qdef'];

/**
 * One vertex
 */
export class Vertex {
	public pos: Float3;
	public norm: Float3;// normal vector
	public uv: Float2;
	public uv_append: Float4[] = [];
	public skin: Skin;
	public edge: number;

	static minSize(reader: PmxReader): number {
		// float3*2 + float2 + uv_append + type + one bone index + edge
		return 32 + 16 * reader.header.uv_append + 1 + reader.header.bone_size + 4;
	}

	constructor(reader: PmxReader) {
		// 12 : float3  | position (x,y,z)
		this.pos = reader.readFloat3();
		// 12 : float3  | normal (x,y,z)
		this.norm = reader.readFloat3();
		// 8  : float2  | UV (u,v)
		this.uv = reader.readFloat2();
		// 16 * n : float4[n] | additional UV (x,y,z,w), n from the header
		for (var i = 0; i < reader.header.uv_append; i++) {
			this.uv_append.push(reader.readFloat4());
		}
		// 1 : byte    | deform type
		this.skin = readSkin(reader);
		this.edge = reader.readFloat();
	}
}

function readSkin(reader: PmxReader): Skin {
	var type = reader.readTag('vertex skin type', SKIN_TYPES);
	switch (type) {
	case 'bdef1':
		// n : bone index | single bone, weight 1.0
		return { type, bones: [reader.boneIdx()] };
	case 'bdef2': {
		var bones: [number, number] = [reader.boneIdx(), reader.boneIdx()];
		// 4 : float | weight of bone 1, bone 2 gets 1.0 - weight
		return { type, bones, weight: reader.readFloat() };
	}
	case 'bdef4':
	case 'qdef': {
		var quad: [number, number, number, number] = [reader.boneIdx(), reader.boneIdx(), reader.boneIdx(), reader.boneIdx()];
		// weight of bone[1-4], the sum is not guaranteed to be 1.0
		return { type, bones: quad, weights: reader.readFloat4() };
	}
	case 'sdef': {
		var pair: [number, number] = [reader.boneIdx(), reader.boneIdx()];
		var weight = reader.readFloat();
		// 12 * 3 : float3 | SDEF-C, SDEF-R0, SDEF-R1
		return { type, bones: pair, weight, c: reader.readFloat3(), r0: reader.readFloat3(), r1: reader.readFloat3() };
	}
	}
}

/**
 * One triangle
 */
export class Face {
	public indices: [number, number, number];
	constructor(reader: PmxReader) {
		// n : vertex index * 3
		this.indices = [reader.vertexIdx(), reader.vertexIdx(), reader.vertexIdx()];
	}
}

/**
 * Texture paths are stored as written by the exporter, usually with `\`.
 */
export function readTexturePath(reader: PmxReader): string {
	return reader.text().replace(/\\/g, '/');
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
