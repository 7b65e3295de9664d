import type { PmxReader } from './header';
import type { Float3 } from './reader';

export interface BoneFlags {
	bit_flag: number;
	tail_is_bone: boolean;// 0x0001
	rotatable: boolean;// 0x0002
	translatable: boolean;// 0x0004
	visible: boolean;// 0x0008
	enabled: boolean;// 0x0010
	ik: boolean;// 0x0020
	local_inherit: boolean;// 0x0080
	inherit_rotation: boolean;// 0x0100
	inherit_translation: boolean;// 0x0200
	fixed_axis: boolean;// 0x0400
	local_axis: boolean;// 0x0800
	physics_after_deform: boolean;// 0x1000
	external_parent: boolean;// 0x2000
}

function boneFlags(bit_flag: number): BoneFlags {
	return {
		bit_flag,
		tail_is_bone: (bit_flag & 0x0001) !== 0,
		rotatable: (bit_flag & 0x0002) !== 0,
		translatable: (bit_flag & 0x0004) !== 0,
		visible: (bit_flag & 0x0008) !== 0,
		enabled: (bit_flag & 0x0010) !== 0,
		ik: (bit_flag & 0x0020) !== 0,
		local_inherit: (bit_flag & 0x0080) !== 0,
		inherit_rotation: (bit_flag & 0x0100) !== 0,
		inherit_translation: (bit_flag & 0x0200) !== 0,
		fixed_axis: (bit_flag & 0x0400) !== 0,
		local_axis: (bit_flag & 0x0800) !== 0,
		physics_after_deform: (bit_flag & 0x1000) !== 0,
		external_parent: (bit_flag & 0x2000) !== 0,
	};
}

/** Where the bone points: another bone, or an offset from its own position. */
export type BoneTail =
	| { type: 'bone'; bone_idx: number }
	| { type: 'offset'; offset: Float3 };

export interface BoneInherit {
	parent_idx: number;
	rate: number;
	rotation: boolean;
	translation: boolean;
}

export interface IkLink {
	bone_idx: number;
	/** radians */
	limit?: { lower: Float3; upper: Float3 };
}

export interface Ik {
	target_idx: number;
	loop_count: number;
	/** radians per iteration */
	limit_rad: number;
	links: IkLink[];
}

/**
 * A bone: parent, tail, and the optional inherit, axis and IK parts its flags select.
 */
export class Bone {
	public name: string;
	public name_en: string;
	public position: Float3;
	public parent_idx: number;
	public layer: number;
	public flags: BoneFlags;
	public tail: BoneTail;
	public inherit?: BoneInherit;
	public fixed_axis?: Float3;
	public local_axis?: { x: Float3; z: Float3 };
	public external_parent_key?: number;
	public ik?: Ik;

	static minSize(reader: PmxReader): number {
		// names, position, parent, layer, flags, tail as a bone index
		return 8 + 12 + 4 + 2 + 2 * reader.header.bone_size;
	}

	constructor(reader: PmxReader) {
		this.name = reader.text();
		this.name_en = reader.text();
		//12 : float3	| position
		this.position = reader.readFloat3();
		//n  : bone index  | parent, -1 for root
		this.parent_idx = reader.boneIdx();
		//4  : int		| deform layer
		this.layer = reader.readInt();
		//2  : bitFlag*2	| bone flags
		this.flags = boneFlags(reader.readShort());

		if (this.flags.tail_is_bone) {
			this.tail = { type: 'bone', bone_idx: reader.boneIdx() };
		} else {
			this.tail = { type: 'offset', offset: reader.readFloat3() };
		}

		if (this.flags.inherit_rotation || this.flags.inherit_translation) {
			this.inherit = {
				parent_idx: reader.boneIdx(),
				rate: reader.readFloat(),
				rotation: this.flags.inherit_rotation,
				translation: this.flags.inherit_translation,
			};
		}
		if (this.flags.fixed_axis) {
			this.fixed_axis = reader.readFloat3();
		}
		if (this.flags.local_axis) {
			this.local_axis = { x: reader.readFloat3(), z: reader.readFloat3() };
		}
		if (this.flags.external_parent) {
			//  4  : int  	| key, not a bone index
			this.external_parent_key = reader.readInt();
		}
		if (this.flags.ik) {
			this.ik = readIk(reader);
		}
	}
}

function readIk(reader: PmxReader): Ik {
	var target_idx = reader.boneIdx();
	// 4  : int  	| loop count (MMD caps this at 255)
	var loop_count = reader.readInt();
	// 4  : float	| limit per loop, radians (4x the PMD value)
	var limit_rad = reader.readFloat();
	var linkLen = reader.readCount('IK link', reader.header.bone_size + 1);
	var links: IkLink[] = [];
	for (var i = 0; i < linkLen; i++) {
		var link: IkLink = { bone_idx: reader.boneIdx() };
		//   1  : byte	| angle limit 0:OFF 1:ON
		if (reader.readBool()) {
			link.limit = { lower: reader.readFloat3(), upper: reader.readFloat3() };
		}
		links.push(link);
	}
	return { target_idx, loop_count, limit_rad, links };
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
