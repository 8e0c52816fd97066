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

import { BitAssembler } from "../demod/BitAssembler.js";
import { CycleClass, ZeroCrossingCounter, classifyCycle } from "../demod/CycleClassifier.js";
import type { CycleThresholds } from "../demod/CycleClassifier.js";
import { DecodeError } from "../utils/DecodeError.js";
import type { LogHandler } from "../utils/Log.js";
import type { Block } from "./Block.js";
import { BlockReader } from "./BlockReader.js";

export type BlockHandler = (block: Block, sampleIdx: number) => void;

export class TapeReader {
    private thresholds: CycleThresholds;
    private log: LogHandler;

    public constructor(thresholds: CycleThresholds, log: LogHandler) {
        this.thresholds = thresholds;
        this.log = log;
    }

    /**
     * Runs all samples through cycle classification, bit assembly and block framing.
     * Errors thrown by the pipeline or the handler are tagged with the current sample.
     */
    public read(samples: ArrayLike<number>, onBlock: BlockHandler) {
        const counter = new ZeroCrossingCounter();
        const bits = new BitAssembler();
        const reader = new BlockReader(this.log);

        let i = 0;
        try {
            for (; i < samples.length; i++) {
                const cycleLength = counter.push(samples[i]);
                if (cycleLength === undefined) {
                    continue;
                }

                const cls = classifyCycle(cycleLength, this.thresholds);
                if (cls == CycleClass.Invalid) {
                    this.log.debug(`Not a 1200/2400 Hz cycle: ${cycleLength} samples at ${i}`);
                    continue;
                }

                const byte = bits.push(cls == CycleClass.One ? 1 : 0);
                if (byte === undefined) {
                    continue;
                }

                const wasHunting = reader.awaitingSync;
                const block = reader.feed(byte);
                if (reader.awaitingSync) {
                    bits.hunt();
                } else if (wasHunting) {
                    bits.align();
                }

                if (block) {
                    onBlock(block, i);
                }
            }
        } catch (e) {
            if (e instanceof DecodeError && e.sampleIdx === undefined) {
                e.sampleIdx = i;
            }
            throw e;
        }
    }
}
