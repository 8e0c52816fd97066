/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

export type Bit = 0 | 1;

/**
 * Shifts bits into bytes, least significant bit first.
 *
 * While hunting, every bit yields the last 8 bits seen so that a sync byte
 * can be found at any bit position. Once aligned, a byte is yielded every 8 bits.
 */
export class BitAssembler {
    private value = 0;
    private count = 0;
    private hunting = true;

    public push(bit: Bit): number | undefined {
        this.value = (this.value >> 1) | (bit << 7);

        if (this.hunting) {
            this.count = Math.min(this.count + 1, 8);
            return this.count == 8 ? this.value : undefined;
        }

        this.count++;
        if (this.count < 8) {
            return undefined;
        }

        const byte = this.value;
        this.value = 0;
        this.count = 0;
        return byte;
    }

    public get isHunting(): boolean {
        return this.hunting;
    }

    public hunt() {
        this.hunting = true;
    }

    public align() {
        this.hunting = false;
        this.value = 0;
        this.count = 0;
    }
}
