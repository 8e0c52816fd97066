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

import { toHex } from "../utils/Strings.js";

export enum BlockType {
    Name = 0x00,
    Data = 0x01,
    EndOfFile = 0xFF,
}

export enum FileType {
    Basic = 0x00,
    Data = 0x01,
    MachineLanguage = 0x02,
}

export enum AsciiFlag {
    Binary = 0x00,
    Ascii = 0xFF,
}

// the service manual only defines continuous and gaps, recordings seen so far use 0
export enum GapFlag {
    Unknown = 0x00,
    Continuous = 0x01,
    Gaps = 0xFF,
}

export const NameLength = 8;
export const AddrLength = 2;

export type Block = NameBlock | DataBlock | EofBlock;

export interface BaseBlock {
    readonly type: BlockType;
    readonly length: number;
    readonly checksum: number;
}

export interface NameBlock extends BaseBlock {
    readonly type: BlockType.Name;
    readonly nameBytes: Uint8Array;
    readonly name: string;
    readonly fileType: number;
    readonly asciiFlag: number;
    readonly gapFlag: number;
    readonly startAddr: Uint8Array;
    readonly loadAddr: Uint8Array;
}

export interface DataBlock extends BaseBlock {
    readonly type: BlockType.Data;
    readonly payload: Uint8Array;
}

export interface EofBlock extends BaseBlock {
    readonly type: BlockType.EndOfFile;
}

export function isBlockType(byte: number): byte is BlockType {
    return byte == BlockType.Name || byte == BlockType.Data || byte == BlockType.EndOfFile;
}

export function isNameBlock(block: Block): block is NameBlock {
    return block.type == BlockType.Name;
}

export function isDataBlock(block: Block): block is DataBlock {
    return block.type == BlockType.Data;
}

// names are space padded on tape, a NUL ends them early
export function decodeName(bytes: Uint8Array): string {
    let name = "";
    for (const byte of bytes) {
        if (byte == 0) {
            break;
        }
        name += String.fromCharCode(byte);
    }
    return name.trimEnd();
}

// the 6809 stores words big-endian
export function addrValue(bytes: Uint8Array): number {
    return ((bytes[0] << 8) | bytes[1]) & 0xFFFF;
}

export function blockBytes(block: Block): Uint8Array {
    switch (block.type) {
        case BlockType.Name:
            return new Uint8Array([
                ...block.nameBytes,
                block.fileType, block.asciiFlag, block.gapFlag,
                ...block.startAddr,
                ...block.loadAddr,
            ]);
        case BlockType.Data:
            return block.payload;
        case BlockType.EndOfFile:
            return new Uint8Array(0);
    }
}

export function describeBlock(block: Pick<Block, "type" | "length">): string {
    switch (block.type) {
        case BlockType.Name:        return "Name Block";
        case BlockType.Data:        return `DATA Block (${block.length})`;
        case BlockType.EndOfFile:   return "EOF Block";
    }
}

export function describeFileType(fileType: number): string {
    switch (fileType) {
        case FileType.Basic:            return "BASIC";
        case FileType.Data:             return "Data";
        case FileType.MachineLanguage:  return "Machine Language";
        default:                        return `unknown (0x${toHex(fileType)})`;
    }
}

export function describeAsciiFlag(flag: number): string {
    switch (flag) {
        case AsciiFlag.Binary:  return "Binary";
        case AsciiFlag.Ascii:   return "ASCII";
        default:                return `unknown (0x${toHex(flag)})`;
    }
}

export function describeGapFlag(flag: number): string {
    switch (flag) {
        case GapFlag.Unknown:       return "Unknown";
        case GapFlag.Continuous:    return "Continuous";
        case GapFlag.Gaps:          return "Gaps";
        default:                    return `unknown (0x${toHex(flag)})`;
    }
}

export function describeNameBlock(block: NameBlock): string[] {
    return [
        `File type:  ${describeFileType(block.fileType)}`,
        `ASCII flag: ${describeAsciiFlag(block.asciiFlag)}`,
        `Gap flag:   ${describeGapFlag(block.gapFlag)}`,
        `ML start:   0x${toHex(addrValue(block.startAddr), 4)}`,
        `ML load:    0x${toHex(addrValue(block.loadAddr), 4)}`,
    ];
}
