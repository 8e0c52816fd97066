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

export function toHex(num: number, width = 2): string {
    return num.toString(16).toUpperCase().padStart(width, "0");
}

export function isPrintable(byte: number): boolean {
    return byte >= 0x20 && byte <= 0x7E;
}

export function escapeByte(byte: number): string {
    return `\\x${toHex(byte)}`;
}

// classic 16 bytes per line dump, identical consecutive lines are folded into a repeat note
export function hexDump(data: Uint8Array): string[] {
    const bytesPerLine = 16;
    const sep = " |  ";
    const res: string[] = [];
    let lastLine: string | undefined;
    let repeat = 0;

    for (let offset = 0; offset < data.length; offset += bytesPerLine) {
        const chunk = data.subarray(offset, offset + bytesPerLine);

        let hex = "";
        let ascii = "";
        for (const byte of chunk) {
            hex += toHex(byte) + " ";
            ascii += isPrintable(byte) ? String.fromCharCode(byte) : ".";
        }

        const pad = " ".repeat((bytesPerLine - chunk.length) * 3);
        const line = hex + pad + sep + ascii;
        if (line == lastLine) {
            repeat++;
            continue;
        }

        if (repeat > 0) {
            res.push(`    Last line repeated ${repeat} time(s)`);
        }
        res.push(offset.toString(16).padStart(8, "0") + " " + line);
        lastLine = line;
        repeat = 0;
    }

    if (repeat > 0) {
        res.push(`    Last line repeated ${repeat} time(s)`);
    }

    return res;
}
