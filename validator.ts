import { DanglingReference, SelfReference } from './errors';
import type { ReferenceViolation, SectionName } from './errors';
import type { Pmx } from './pmx';

export type ReferenceMode = 'first' | 'all';

const NONE = -1;
const INTERNAL_TOON_COUNT = 10;

class Collector {
	public violations: ReferenceViolation[] = [];
	constructor(private mode: ReferenceMode) {}

	get done(): boolean {
		return this.mode === 'first' && this.violations.length > 0;
	}
	check(section: SectionName, record_index: number, target: SectionName, length: number, value: number, nullable: boolean) {
		if (this.done || (nullable && value === NONE) || (value >= 0 && value < length)) {
			return;
		}
		this.violations.push(new DanglingReference(section, record_index, target, value));
	}
	add(violation: ReferenceViolation) {
		if (!this.done) {
			this.violations.push(violation);
		}
	}
}

/**
 * Cross-checks every index stored in the document against the section it
 * points into. PMX only refers backwards, but a vertex or face is read
 * before the bones and morphs that may refer to it, so this runs once all
 * sections are loaded.
 *
 * In `first` mode at most one violation is returned.
 */
export function findReferenceErrors(pmx: Pmx, mode: ReferenceMode = 'first'): ReferenceViolation[] {
	var c = new Collector(mode);
	var nVertex = pmx.vertices.length;
	var nTexture = pmx.textures.length;
	var nMaterial = pmx.materials.length;
	var nBone = pmx.bones.length;
	var nMorph = pmx.morphs.length;
	var nRigid = pmx.rigids.length;

	pmx.vertices.forEach((v, i) => {
		var bones: number[] = v.skin.bones;
		bones.forEach((b) => c.check('Vertex', i, 'Bone', nBone, b, true));
	});
	pmx.faces.forEach((f, i) => {
		f.indices.forEach((v) => c.check('Face', i, 'Vertex', nVertex, v, false));
	});
	pmx.materials.forEach((m, i) => {
		c.check('Material', i, 'Texture', nTexture, m.texture_idx, true);
		c.check('Material', i, 'Texture', nTexture, m.sphere_idx, true);
		if (m.toon.type === 'texture') {
			c.check('Material', i, 'Texture', nTexture, m.toon.index, true);
		} else {
			c.check('Material', i, 'InternalToon', INTERNAL_TOON_COUNT, m.toon.index, false);
		}
	});
	pmx.bones.forEach((b, i) => {
		c.check('Bone', i, 'Bone', nBone, b.parent_idx, true);
		if (b.tail.type === 'bone') {
			c.check('Bone', i, 'Bone', nBone, b.tail.bone_idx, true);
		}
		if (b.inherit) {
			c.check('Bone', i, 'Bone', nBone, b.inherit.parent_idx, true);
		}
		if (b.ik) {
			c.check('Bone', i, 'Bone', nBone, b.ik.target_idx, true);
			b.ik.links.forEach((link) => c.check('Bone', i, 'Bone', nBone, link.bone_idx, true));
		}
	});
	pmx.morphs.forEach((m, i) => {
		var o = m.offsets;
		switch (o.type) {
		case 'group':
			o.items.forEach((item) => {
				c.check('Morph', i, 'Morph', nMorph, item.morph_idx, false);
				if (item.morph_idx === i) {
					c.add(new SelfReference(i));
				}
			});
			break;
		case 'flip':
			o.items.forEach((item) => c.check('Morph', i, 'Morph', nMorph, item.morph_idx, false));
			break;
		case 'vertex':
		case 'uv':
			o.items.forEach((item) => c.check('Morph', i, 'Vertex', nVertex, item.vertex_idx, false));
			break;
		case 'bone':
			o.items.forEach((item) => c.check('Morph', i, 'Bone', nBone, item.bone_idx, false));
			break;
		case 'material':
			// -1 applies the offset to every material
			o.items.forEach((item) => c.check('Morph', i, 'Material', nMaterial, item.material_idx, true));
			break;
		case 'impulse':
			o.items.forEach((item) => c.check('Morph', i, 'RigidBody', nRigid, item.rigid_idx, false));
			break;
		}
	});
	pmx.frames.forEach((f, i) => {
		f.items.forEach((item) => {
			if (item.type === 'bone') {
				c.check('DisplayFrame', i, 'Bone', nBone, item.bone_idx, false);
			} else {
				c.check('DisplayFrame', i, 'Morph', nMorph, item.morph_idx, false);
			}
		});
	});
	pmx.rigids.forEach((r, i) => c.check('RigidBody', i, 'Bone', nBone, r.bone_idx, true));
	pmx.joints.forEach((j, i) => {
		c.check('Joint', i, 'RigidBody', nRigid, j.rigid_a_idx, true);
		c.check('Joint', i, 'RigidBody', nRigid, j.rigid_b_idx, true);
	});
	pmx.soft_bodies.forEach((s, i) => {
		c.check('SoftBody', i, 'Material', nMaterial, s.material_idx, true);
		s.anchors.forEach((a) => {
			c.check('SoftBody', i, 'RigidBody', nRigid, a.rigid_idx, false);
			c.check('SoftBody', i, 'Vertex', nVertex, a.vertex_idx, false);
		});
		s.pins.forEach((p) => c.check('SoftBody', i, 'Vertex', nVertex, p, false));
	});
	return c.violations;
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
