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

import { ProgramLister } from "./basic/ProgramLister.js";
import type { ProgramListing } from "./basic/ProgramLister.js";
import { BlockType, describeBlock } from "./blocks/Block.js";
import type { Block } from "./blocks/Block.js";
import { TapeReader } from "./blocks/TapeReader.js";
import { withDefaults } from "./demod/CycleClassifier.js";
import type { CycleThresholds } from "./demod/CycleClassifier.js";
import { DecodeError } from "./utils/DecodeError.js";
import { ConsoleLogHandler, filterDebug } from "./utils/Log.js";
import type { LogHandler } from "./utils/Log.js";

export interface DecoderOptions {
    thresholds?: Partial<CycleThresholds>;
    debug?: boolean;        // report every field, framing error and noise cycle
    verbose?: boolean;      // report sample count and a block summary
    log?: LogHandler;
}

export interface BlockSummary {
    type: BlockType;
    length: number;
    sampleIdx: number;
}

export interface DecodeOutput {
    sampleCount: number;
    programs: ProgramListing[];
    blocks: BlockSummary[];
    error?: DecodeError;
}

export class CassetteDecoder {
    private opts: DecoderOptions;
    private thresholds: CycleThresholds;
    private log: LogHandler;
    private lister = new ProgramLister();

    public constructor(opts: DecoderOptions = {}) {
        this.opts = opts;
        this.thresholds = withDefaults(opts.thresholds);
        this.log = filterDebug(opts.log ?? ConsoleLogHandler, opts.debug ?? false);
    }

    public decode(samples: ArrayLike<number>): DecodeOutput {
        const programs: ProgramListing[] = [];
        const blocks: BlockSummary[] = [];
        let chain: Block[] = [];

        const finishProgram = (complete: boolean) => {
            const listing = this.lister.list(chain, complete);
            chain = [];
            if (listing.header || listing.lines.length > 0) {
                programs.push(listing);
            }
        };

        if (this.opts.verbose) {
            this.log.info(`Samples: ${samples.length}`);
        }

        const tape = new TapeReader(this.thresholds, this.log);
        let error: DecodeError | undefined;
        try {
            tape.read(samples, (block, sampleIdx) => {
                blocks.push({ type: block.type, length: block.length, sampleIdx });

                // a new name block starts a new program even if the last one had no EOF block
                if (block.type == BlockType.Name && chain.length > 0) {
                    finishProgram(false);
                }

                chain.push(block);
                if (block.type == BlockType.EndOfFile) {
                    finishProgram(true);
                }
            });

            if (chain.length > 0) {
                finishProgram(false);
            }
        } catch (e) {
            if (!(e instanceof DecodeError)) {
                throw e;
            }
            error = e;
        }

        if (this.opts.verbose) {
            this.log.info(`Decoded ${blocks.length} blocks`);
            blocks.forEach(b => this.log.info(describeBlock(b)));
        }

        return { sampleCount: samples.length, programs, blocks, error };
    }
}
