import { UnknownVariant } from './errors';
import type { PmxReader } from './header';
import type { Float3 } from './reader';

export type RigidShape =
	| { type: 'sphere'; radius: number }
	| { type: 'box'; size: Float3 }
	| { type: 'capsule'; radius: number; height: number };

const SHAPE_TYPES: readonly RigidShape['type'][] = ['sphere', 'box', 'capsule'];

/** static follows the bone, dynamic is simulated, dynamic_bone is simulated and snapped to the bone */
export type RigidMode = 'static' | 'dynamic' | 'dynamic_bone';
const RIGID_MODES: readonly RigidMode[] = ['static', 'dynamic', 'dynamic_bone'];

export type JointType = 'spring_6dof' | '6dof' | 'p2p' | 'cone_twist' | 'slider' | 'hinge';
// PMX 2.0 only knows the spring 6DOF joint
const JOINT_TYPES_20: readonly JointType[] = ['spring_6dof'];
const JOINT_TYPES_21: readonly JointType[] = ['spring_6dof', '6dof', 'p2p', 'cone_twist', 'slider', 'hinge'];

function rigidShape(type: RigidShape['type'], size: Float3): RigidShape {
	switch (type) {
	case 'sphere':
		return { type, radius: size[0] };
	case 'box':
		return { type, size };
	case 'capsule':
		return { type, radius: size[0], height: size[1] };
	}
}

/**
 * Rigid body
 */
export class RigidBody {
	public name: string;
	public name_en: string;
	public bone_idx: number;
	public group: number;
	public nocollision_group: number;
	public shape: RigidShape;
	public size: Float3;
	public position: Float3;
	public rotation: Float3;
	public mass: number;
	public linear_damping: number;
	public angular_damping: number;
	public restitution: number;
	public friction: number;
	public mode: RigidMode;

	static minSize(reader: PmxReader): number {
		return 8 + reader.header.bone_size + 1 + 2 + 1 + 36 + 20 + 1;
	}

	constructor(reader: PmxReader) {
		this.name = reader.text();
		this.name_en = reader.text();
		// n  : bone index  | related bone, -1 for none
		this.bone_idx = reader.boneIdx();
		// 1  : byte	| group
		this.group = reader.readByte();
		// 2  : ushort	| non-collision group mask
		this.nocollision_group = reader.readShort();
		// 1  : byte	| shape 0:sphere 1:box 2:capsule
		var type = reader.readTag('rigid body shape', SHAPE_TYPES);
		// 12 : float3	| size(x,y,z), meaning depends on the shape
		this.size = reader.readFloat3();
		this.shape = rigidShape(type, this.size);
		this.position = reader.readFloat3();
		// 12 : float3	| rotation(x,y,z), radians
		this.rotation = reader.readFloat3();
		this.mass = reader.readFloat();
		this.linear_damping = reader.readFloat();
		this.angular_damping = reader.readFloat();
		this.restitution = reader.readFloat();
		this.friction = reader.readFloat();
		this.mode = reader.readTag('rigid body mode', RIGID_MODES);
	}
}

/**
 * Joint
 */
export class Joint {
	public name: string;
	public name_en: string;
	public type: JointType;
	public rigid_a_idx: number;
	public rigid_b_idx: number;
	public position: Float3;
	public rotation: Float3;
	public position_lower: Float3;
	public position_upper: Float3;
	public rotation_lower: Float3;
	public rotation_upper: Float3;
	public spring_position: Float3;
	public spring_rotation: Float3;

	static minSize(reader: PmxReader): number {
		return 8 + 1 + 2 * reader.header.rigidbody_size + 96;
	}

	constructor(reader: PmxReader) {
		this.name = reader.text();
		this.name_en = reader.text();
		var types = reader.header.version === 2.0 ? JOINT_TYPES_20 : JOINT_TYPES_21;
		this.type = reader.readTag('joint type', types);
		//n  : rigid body index | A, -1 for none
		this.rigid_a_idx = reader.rigidIdx();
		//n  : rigid body index | B, -1 for none
		this.rigid_b_idx = reader.rigidIdx();
		this.position = reader.readFloat3();
		// radians
		this.rotation = reader.readFloat3();
		this.position_lower = reader.readFloat3();
		this.position_upper = reader.readFloat3();
		this.rotation_lower = reader.readFloat3();
		this.rotation_upper = reader.readFloat3();
		this.spring_position = reader.readFloat3();
		this.spring_rotation = reader.readFloat3();
	}
}

export type SoftShape = 'tri_mesh' | 'rope';
const SOFT_SHAPES: readonly SoftShape[] = ['tri_mesh', 'rope'];

export type AeroModel = 'v_point' | 'v_two_sided' | 'v_one_sided' | 'f_two_sided' | 'f_one_sided';
const AERO_MODELS: readonly AeroModel[] = ['v_point', 'v_two_sided', 'v_one_sided', 'f_two_sided', 'f_one_sided'];

export interface SoftAnchor {
	rigid_idx: number;
	vertex_idx: number;
	near_mode: boolean;
}

/**
 * Soft body (PMX 2.1)
 */
export class SoftBody {
	public name: string;
	public name_en: string;
	public shape: SoftShape;
	public material_idx: number;
	public group: number;
	public nocollision_group: number;
	public flags: { bit_flag: number; b_link: boolean; cluster: boolean; link_crossing: boolean };
	public b_link_distance: number;
	public cluster_count: number;
	public total_mass: number;
	public collision_margin: number;
	public aero_model: AeroModel;
	public config: {
		vcf: number; dp: number; dg: number; lf: number; pr: number; vc: number;
		df: number; mt: number; chr: number; khr: number; shr: number; ahr: number;
	};
	public cluster: {
		srhr_cl: number; skhr_cl: number; sshr_cl: number;
		sr_splt_cl: number; sk_splt_cl: number; ss_splt_cl: number;
	};
	public iteration: { v_it: number; p_it: number; d_it: number; c_it: number };
	public material: { lst: number; ast: number; vst: number };
	public anchors: SoftAnchor[] = [];
	public pins: number[] = [];

	static minSize(reader: PmxReader): number {
		return 141 + reader.header.material_size;
	}

	constructor(reader: PmxReader) {
		this.name = reader.text();
		this.name_en = reader.text();
		// 1 : byte | 0:TriMesh 1:Rope
		this.shape = reader.readTag('soft body shape', SOFT_SHAPES);
		this.material_idx = reader.materialIdx();
		this.group = reader.readByte();
		this.nocollision_group = reader.readShort();
		var bit_flag = reader.readByte();
		this.flags = {
			bit_flag,
			b_link: (bit_flag & 0x01) !== 0,
			cluster: (bit_flag & 0x02) !== 0,
			link_crossing: (bit_flag & 0x04) !== 0,
		};
		this.b_link_distance = reader.readInt();
		this.cluster_count = reader.readInt();
		this.total_mass = reader.readFloat();
		this.collision_margin = reader.readFloat();
		// 4 : int | aero model, stored as an int unlike the other tags
		var aeroPos = reader.pos();
		var aero = reader.readInt();
		if (aero < 0 || aero >= AERO_MODELS.length) {
			throw new UnknownVariant('soft body aero model', aero, aeroPos);
		}
		this.aero_model = AERO_MODELS[aero];
		this.config = {
			vcf: reader.readFloat(), dp: reader.readFloat(), dg: reader.readFloat(), lf: reader.readFloat(),
			pr: reader.readFloat(), vc: reader.readFloat(), df: reader.readFloat(), mt: reader.readFloat(),
			chr: reader.readFloat(), khr: reader.readFloat(), shr: reader.readFloat(), ahr: reader.readFloat(),
		};
		this.cluster = {
			srhr_cl: reader.readFloat(), skhr_cl: reader.readFloat(), sshr_cl: reader.readFloat(),
			sr_splt_cl: reader.readFloat(), sk_splt_cl: reader.readFloat(), ss_splt_cl: reader.readFloat(),
		};
		this.iteration = { v_it: reader.readInt(), p_it: reader.readInt(), d_it: reader.readInt(), c_it: reader.readInt() };
		this.material = { lst: reader.readFloat(), ast: reader.readFloat(), vst: reader.readFloat() };

		var h = reader.header;
		var anchorLen = reader.readCount('soft body anchor', h.rigidbody_size + h.vertex_size + 1);
		for (var i = 0; i < anchorLen; i++) {
			this.anchors.push({ rigid_idx: reader.rigidIdx(), vertex_idx: reader.vertexIdx(), near_mode: reader.readBool() });
		}
		var pinLen = reader.readCount('soft body pin', h.vertex_size);
		for (var j = 0; j < pinLen; j++) {
			this.pins.push(reader.vertexIdx());
		}
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
