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

import { ChecksumError } from "../utils/DecodeError.js";
import type { LogHandler } from "../utils/Log.js";
import { toHex } from "../utils/Strings.js";
import { AddrLength, BlockType, NameLength, blockBytes, decodeName, isBlockType } from "./Block.js";
import type { Block, NameBlock } from "./Block.js";

export const SyncByte = 0x3C;
export const LeaderByte = 0x55;
export const NameBlockLength = 15;

export enum ReaderState {
    NeedSync,
    NeedBlockType,
    NeedLength,
    NeedName,
    NeedFileType,
    NeedAsciiFlag,
    NeedGapFlag,
    NeedStartAddr,
    NeedLoadAddr,
    NeedData,
    NeedChecksum,
    NeedLeadByte,
}

type Frame =
    SyncFrame | TypeFrame | LengthFrame |
    NameFrame | FileTypeFrame | AsciiFlagFrame | GapFlagFrame |
    StartAddrFrame | LoadAddrFrame | DataFrame |
    ChecksumFrame | LeadByteFrame;

interface SyncFrame {
    state: ReaderState.NeedSync;
}

interface TypeFrame {
    state: ReaderState.NeedBlockType;
}

interface LengthFrame {
    state: ReaderState.NeedLength;
    type: BlockType;
    checksum: number;
}

interface CountedFrame {
    checksum: number;
    length: number;
}

interface NameFrame extends CountedFrame {
    state: ReaderState.NeedName;
    name: number[];
}

interface FileTypeFrame extends CountedFrame {
    state: ReaderState.NeedFileType;
    name: number[];
}

interface AsciiFlagFrame extends CountedFrame {
    state: ReaderState.NeedAsciiFlag;
    name: number[];
    fileType: number;
}

interface GapFlagFrame extends CountedFrame {
    state: ReaderState.NeedGapFlag;
    name: number[];
    fileType: number;
    asciiFlag: number;
}

interface StartAddrFrame extends CountedFrame {
    state: ReaderState.NeedStartAddr;
    name: number[];
    fileType: number;
    asciiFlag: number;
    gapFlag: number;
    startAddr: number[];
}

interface LoadAddrFrame extends CountedFrame {
    state: ReaderState.NeedLoadAddr;
    name: number[];
    fileType: number;
    asciiFlag: number;
    gapFlag: number;
    startAddr: number[];
    loadAddr: number[];
}

interface DataFrame extends CountedFrame {
    state: ReaderState.NeedData;
    payload: Uint8Array;
    index: number;
}

// block content is complete but not yet verified
interface ChecksumFrame {
    state: ReaderState.NeedChecksum;
    block: Block;
}

interface LeadByteFrame {
    state: ReaderState.NeedLeadByte;
    block: Block;
}

function addSum(sum: number, byte: number): number {
    return (sum + byte) & 0xFF;
}

/**
 * Turns a byte stream into tape blocks:
 * sync byte, block type, length, content, checksum, leader byte.
 *
 * Framing errors make the reader hunt for the next sync byte, a checksum
 * mismatch throws.
 */
export class BlockReader {
    private frame: Frame = { state: ReaderState.NeedSync };
    private log: LogHandler;

    public constructor(log: LogHandler) {
        this.log = log;
    }

    public get state(): ReaderState {
        return this.frame.state;
    }

    public get awaitingSync(): boolean {
        return this.frame.state == ReaderState.NeedSync;
    }

    /**
     * Feeds the next byte.
     * @returns the block completed by this byte, if any
     */
    public feed(byte: number): Block | undefined {
        const frame = this.frame;

        switch (frame.state) {
            case ReaderState.NeedSync:
                if (byte == SyncByte) {
                    this.log.debug(`Found sync byte: 0x${toHex(byte)}`);
                    this.frame = { state: ReaderState.NeedBlockType };
                }
                break;
            case ReaderState.NeedBlockType:
                this.onBlockType(byte);
                break;
            case ReaderState.NeedLength:
                this.onLength(frame, byte);
                break;
            case ReaderState.NeedName:
                this.log.debug(`Found name byte: 0x${toHex(byte)}`);
                frame.name.push(byte);
                frame.checksum = addSum(frame.checksum, byte);
                if (frame.name.length == NameLength) {
                    this.frame = { ...frame, state: ReaderState.NeedFileType };
                }
                break;
            case ReaderState.NeedFileType:
                this.log.debug(`Found file type: 0x${toHex(byte)}`);
                this.frame = {
                    ...frame,
                    state: ReaderState.NeedAsciiFlag,
                    checksum: addSum(frame.checksum, byte),
                    fileType: byte,
                };
                break;
            case ReaderState.NeedAsciiFlag:
                this.log.debug(`Found ASCII flag: 0x${toHex(byte)}`);
                this.frame = {
                    ...frame,
                    state: ReaderState.NeedGapFlag,
                    checksum: addSum(frame.checksum, byte),
                    asciiFlag: byte,
                };
                break;
            case ReaderState.NeedGapFlag:
                this.log.debug(`Found gap flag: 0x${toHex(byte)}`);
                this.frame = {
                    ...frame,
                    state: ReaderState.NeedStartAddr,
                    checksum: addSum(frame.checksum, byte),
                    gapFlag: byte,
                    startAddr: [],
                };
                break;
            case ReaderState.NeedStartAddr:
                this.log.debug(`Found start address byte: 0x${toHex(byte)}`);
                frame.startAddr.push(byte);
                frame.checksum = addSum(frame.checksum, byte);
                if (frame.startAddr.length == AddrLength) {
                    this.frame = { ...frame, state: ReaderState.NeedLoadAddr, loadAddr: [] };
                }
                break;
            case ReaderState.NeedLoadAddr:
                this.onLoadAddr(frame, byte);
                break;
            case ReaderState.NeedData:
                frame.payload[frame.index++] = byte;
                frame.checksum = addSum(frame.checksum, byte);
                if (frame.index == frame.length) {
                    this.log.debug(`Found ${frame.length} data bytes`);
                    this.frame = {
                        state: ReaderState.NeedChecksum,
                        block: {
                            type: BlockType.Data,
                            length: frame.length,
                            checksum: frame.checksum,
                            payload: frame.payload,
                        },
                    };
                }
                break;
            case ReaderState.NeedChecksum:
                this.log.debug(`Found checksum: 0x${toHex(byte)}, computed 0x${toHex(frame.block.checksum)}`);
                if (byte != frame.block.checksum) {
                    throw new ChecksumError(
                        `Checksum mismatch in ${BlockType[frame.block.type]} block: ` +
                        `read 0x${toHex(byte)}, computed 0x${toHex(frame.block.checksum)}`,
                        byte, frame.block.checksum, blockBytes(frame.block),
                    );
                }
                this.frame = { state: ReaderState.NeedLeadByte, block: frame.block };
                break;
            case ReaderState.NeedLeadByte:
                this.log.debug(`Found lead byte: 0x${toHex(byte)}`);
                this.frame = { state: ReaderState.NeedSync };
                return frame.block;
        }

        return undefined;
    }

    private onBlockType(byte: number) {
        if (!isBlockType(byte)) {
            this.log.debug(`Found bad block type 0x${toHex(byte)}, resetting`);
            this.frame = { state: ReaderState.NeedSync };
            return;
        }

        this.log.debug(`Found block type: 0x${toHex(byte)}`);
        this.frame = { state: ReaderState.NeedLength, type: byte, checksum: byte };
    }

    private onLength(frame: LengthFrame, length: number) {
        this.log.debug(`Found length: 0x${toHex(length)}`);
        const checksum = addSum(frame.checksum, length);

        switch (frame.type) {
            case BlockType.Name:
                if (length != NameBlockLength) {
                    this.log.warn(`Found bad length 0x${toHex(length)} for name block, resetting`);
                    this.frame = { state: ReaderState.NeedSync };
                } else {
                    this.frame = { state: ReaderState.NeedName, checksum, length, name: [] };
                }
                break;
            case BlockType.EndOfFile:
                if (length != 0) {
                    this.log.warn(`Found bad length 0x${toHex(length)} for EOF block, resetting`);
                    this.frame = { state: ReaderState.NeedSync };
                } else {
                    this.frame = {
                        state: ReaderState.NeedChecksum,
                        block: { type: BlockType.EndOfFile, length, checksum },
                    };
                }
                break;
            case BlockType.Data:
                if (length == 0) {
                    this.frame = {
                        state: ReaderState.NeedChecksum,
                        block: { type: BlockType.Data, length, checksum, payload: new Uint8Array(0) },
                    };
                } else {
                    this.frame = {
                        state: ReaderState.NeedData,
                        checksum, length,
                        payload: new Uint8Array(length),
                        index: 0,
                    };
                }
                break;
        }
    }

    private onLoadAddr(frame: LoadAddrFrame, byte: number) {
        this.log.debug(`Found load address byte: 0x${toHex(byte)}`);
        frame.loadAddr.push(byte);
        frame.checksum = addSum(frame.checksum, byte);

        // the declared length does not count the load address
        frame.length--;

        if (frame.loadAddr.length < AddrLength) {
            return;
        }

        const nameBytes = new Uint8Array(frame.name);
        const block: NameBlock = {
            type: BlockType.Name,
            length: frame.length,
            checksum: frame.checksum,
            nameBytes: nameBytes,
            name: decodeName(nameBytes),
            fileType: frame.fileType,
            asciiFlag: frame.asciiFlag,
            gapFlag: frame.gapFlag,
            startAddr: new Uint8Array(frame.startAddr),
            loadAddr: new Uint8Array(frame.loadAddr),
        };
        this.log.debug(`Found name: ${block.name}`);
        this.frame = { state: ReaderState.NeedChecksum, block };
    }
}
