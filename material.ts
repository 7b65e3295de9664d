import { UnknownVariant } from './errors';
import type { PmxReader } from './header';
import type { Float3, Float4 } from './reader';

export type SphereMode = 'disabled' | 'multiply' | 'add' | 'sub_texture';
const SPHERE_MODES: readonly SphereMode[] = ['disabled', 'multiply', 'add', 'sub_texture'];

/** `shared` refers to toon01.bmp..toon10.bmp by 0..9, `texture` to the texture table. */
export type Toon =
	| { type: 'shared'; index: number }
	| { type: 'texture'; index: number };

export interface MaterialFlags {
	bit_flag: number;
	double_sided: boolean;
	ground_shadow: boolean;
	self_shadow_map: boolean;
	self_shadow: boolean;
	edge: boolean;
	// PMX 2.1
	vertex_color: boolean;
	point_draw: boolean;
	line_draw: boolean;
}

function materialFlags(bit_flag: number): MaterialFlags {
	return {
		bit_flag,
		double_sided: (bit_flag & 0x01) !== 0,
		ground_shadow: (bit_flag & 0x02) !== 0,
		self_shadow_map: (bit_flag & 0x04) !== 0,
		self_shadow: (bit_flag & 0x08) !== 0,
		edge: (bit_flag & 0x10) !== 0,
		vertex_color: (bit_flag & 0x20) !== 0,
		point_draw: (bit_flag & 0x40) !== 0,
		line_draw: (bit_flag & 0x80) !== 0,
	};
}

/**
 * Material
 */
export class Material {
	public name: string;
	public name_en: string;
	public diffuse: Float4;
	public specular: Float3;
	public specular_mod: number;
	public ambient: Float3;
	public flags: MaterialFlags;
	public edge_color: Float4;
	public edge_size: number;

	public texture_idx: number;
	public sphere_idx: number;
	public sphere_mode: SphereMode;
	public toon: Toon;
	public memo: string;
	public refs_vertex: number;

	static minSize(reader: PmxReader): number {
		return 84 + 2 * reader.header.texture_size;
	}

	constructor(reader: PmxReader) {
		// 4 + n : TextBuf	| name
		this.name = reader.text();
		// 4 + n : TextBuf	| english name
		this.name_en = reader.text();
		// 16 : float4	| Diffuse (R,G,B,A)
		this.diffuse = reader.readFloat4();
		// 12 : float3	| Specular (R,G,B)
		this.specular = reader.readFloat3();
		// 4  : float	| specular power
		this.specular_mod = reader.readFloat();
		// 12 : float3	| Ambient (R,G,B)
		this.ambient = reader.readFloat3();
		// 1  : bitFlag  	| draw flags
		this.flags = materialFlags(reader.readByte());
		// 16 : float4	| edge color (R,G,B,A)
		this.edge_color = reader.readFloat4();
		// 4  : float	| edge size
		this.edge_size = reader.readFloat();

		// n  : texture index | -1 for none
		this.texture_idx = reader.textureIdx();
		// n  : texture index | sphere texture, -1 for none
		this.sphere_idx = reader.textureIdx();
		// 1  : byte	| sphere mode 0:off 1:sph 2:spa 3:sub texture
		this.sphere_mode = reader.readTag('material sphere mode', SPHERE_MODES);
		// 1  : byte	| shared toon flag, then a byte or a texture index
		var flagPos = reader.pos();
		var shared_toon = reader.readByte();
		switch (shared_toon) {
		case 0:
			this.toon = { type: 'texture', index: reader.textureIdx() };
			break;
		case 1:
			this.toon = { type: 'shared', index: reader.readByte() };
			break;
		default:
			throw new UnknownVariant('material toon flag', shared_toon, flagPos);
		}
		// 4 + n : TextBuf	| memo
		this.memo = reader.text();
		// 4  : int	| number of face indices drawn with this material (multiple of 3)
		this.refs_vertex = reader.readInt();
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
