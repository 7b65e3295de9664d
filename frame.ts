import type { PmxReader } from './header';

export type FrameItem =
	| { type: 'bone'; bone_idx: number }
	| { type: 'morph'; morph_idx: number };

const ITEM_TYPES: readonly FrameItem['type'][] = ['bone', 'morph'];

/**
 * Display frame: a named group of bones and morphs shown in the editor.
 */
export class Frame {
	public name: string;
	public name_en: string;
	public special: boolean;
	public items: FrameItem[] = [];

	static minSize(): number {
		return 8 + 1 + 4;
	}

	constructor(reader: PmxReader) {
		this.name = reader.text();
		this.name_en = reader.text();
		// 1 : byte	| 0:normal 1:special (Root, 表情)
		this.special = reader.readBool();
		var h = reader.header;
		var count = reader.readCount('display frame item', 1 + Math.min(h.bone_size, h.morph_size));
		for (var i = 0; i < count; i++) {
			// 1 : byte	| 0:bone 1:morph
			if (reader.readTag('display frame item type', ITEM_TYPES) === 'morph') {
				this.items.push({ type: 'morph', morph_idx: reader.morphIdx() });
			} else {
				this.items.push({ type: 'bone', bone_idx: reader.boneIdx() });
			}
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
