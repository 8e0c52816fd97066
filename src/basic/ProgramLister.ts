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

import { isDataBlock, isNameBlock } from "../blocks/Block.js";
import type { Block, DataBlock, NameBlock } from "../blocks/Block.js";
import { ListingError } from "../utils/DecodeError.js";
import { toHex } from "../utils/Strings.js";
import { detokenize } from "./Detokenizer.js";

export const MaxLineLength = 4096;

export interface ListingLine {
    lineNumber: number;
    text: string;
}

export interface ProgramListing {
    header?: NameBlock;
    lines: ListingLine[];

    // false if the recording ended before the EOF block
    complete: boolean;
}

export function formatLine(line: ListingLine): string {
    return `${line.lineNumber} ${line.text}`;
}

export function formatListing(listing: ProgramListing): string[] {
    const res: string[] = [];
    if (listing.header) {
        res.push(`Program: ${listing.header.name}`);
    }
    res.push(...listing.lines.map(formatLine));
    return res;
}

/**
 * Reads the concatenated payload of consecutive data blocks.
 * The sequence number counts every block boundary that was crossed.
 */
class PayloadCursor {
    private blocks: readonly DataBlock[];
    private blockIdx = 0;
    private offset = 0;
    private firstSeq: number;

    public constructor(blocks: readonly DataBlock[]) {
        this.blocks = blocks;
        this.firstSeq = blocks[0].payload[0];
    }

    public get atEnd(): boolean {
        return this.blockIdx >= this.blocks.length;
    }

    public get isLastBlock(): boolean {
        return this.blockIdx == this.blocks.length - 1;
    }

    public get seq(): number {
        return (this.firstSeq + this.blockIdx) & 0xFF;
    }

    public get payload(): Uint8Array {
        return this.blocks[Math.min(this.blockIdx, this.blocks.length - 1)].payload;
    }

    public remaining(): Uint8Array {
        return this.payload.subarray(this.offset);
    }

    public next(): number {
        if (this.atEnd) {
            throw new ListingError("Line record truncated at end of program data", this.payload);
        }

        const byte = this.payload[this.offset++];
        if (this.offset == this.payload.length) {
            this.blockIdx++;
            this.offset = 0;
        }
        return byte;
    }
}

/**
 * Lists a tokenized BASIC program from the blocks of one recording.
 *
 * Each line is stored as
 *  - a byte that is the current or the next block sequence number,
 *  - a next line offset,
 *  - the line number as big-endian word,
 *  - the tokenized line, terminated by 0.
 *
 * The next line offset is not used: its meaning is not consistent across
 * block boundaries, lines are split at the terminating 0 instead.
 */
export class ProgramLister {
    public list(chain: readonly Block[], complete: boolean): ProgramListing {
        const first = chain.length > 0 ? chain[0] : undefined;
        const header = first && isNameBlock(first) ? first : undefined;
        const lines: ListingLine[] = [];

        const dataBlocks = chain.filter(isDataBlock).filter(b => b.payload.length > 0);
        if (dataBlocks.length == 0) {
            return { header, lines, complete };
        }

        const cursor = new PayloadCursor(dataBlocks);
        while (!cursor.atEnd && !this.atProgramEnd(cursor)) {
            try {
                lines.push(this.readLine(cursor));
            } catch (e) {
                // a recording that was cut short may end in the middle of a line
                if (!complete && cursor.atEnd) {
                    break;
                }
                throw e;
            }
        }

        return { header, lines, complete };
    }

    // three trailing zeros end the program, fewer if they are the last bytes of the recording
    private atProgramEnd(cursor: PayloadCursor): boolean {
        const rest = cursor.remaining();
        const allZero = rest.every(b => b == 0);
        if (rest.length == 3 && allZero) {
            return true;
        }
        return cursor.isLastBlock && rest.length < 3 && allZero;
    }

    private readLine(cursor: PayloadCursor): ListingLine {
        const seq = cursor.seq;
        const startPayload = cursor.payload;
        const tag = cursor.next();
        if (tag != seq && tag != ((seq + 1) & 0xFF)) {
            throw new ListingError(
                `Bad start of line: 0x${toHex(tag)} is neither 0x${toHex(seq)} nor 0x${toHex((seq + 1) & 0xFF)}`,
                startPayload,
            );
        }

        cursor.next(); // next line offset, see above
        const high = cursor.next();
        const low = cursor.next();
        const lineNumber = (high << 8) | low;

        const body: number[] = [];
        while (true) {
            const byte = cursor.next();
            if (byte == 0) {
                break;
            }

            body.push(byte);
            if (body.length >= MaxLineLength) {
                throw new ListingError(
                    `Line ${lineNumber} too long (${body.length} >= ${MaxLineLength})`,
                    cursor.payload,
                );
            }
        }

        return { lineNumber, text: detokenize(body) };
    }
}
