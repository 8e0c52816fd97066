#!/usr/bin/env node
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

import { command, extendType, flag, option, optional, positional, run, string } from "cmd-ts";
import { CassetteDecoder } from "../src/CassetteDecoder.js";
import { WavError, loadSamples } from "../src/audio/WavReader.js";
import { formatListing } from "../src/basic/ProgramLister.js";
import { describeNameBlock } from "../src/blocks/Block.js";
import { checkThresholds, withDefaults } from "../src/demod/CycleClassifier.js";
import { formatDecodeError } from "../src/utils/DecodeError.js";
import { ConsoleLogHandler } from "../src/utils/Log.js";
import { hexDump } from "../src/utils/Strings.js";

const MaxCycleLength = 10000;

const cycleLength = extendType(string, async (str) => {
    if (str.startsWith("-")) {
        throw new Error(`Negative value ${str}`);
    }
    if (!str.match(/^(0x[0-9a-f]+|[0-9]+)$/i)) {
        throw new Error(`Invalid value ${str}`);
    }
    const value = Number(str);
    if (value > MaxCycleLength) {
        throw new Error(`Value too large ${str}`);
    }
    return value;
});

const cmd = command({
    name: "cassette-decoder",
    description: "Lists the BASIC program of a Color Computer cassette recording (16 bit mono PCM .wav, 44100 Hz)",
    args: {
        debug: flag({
            long: "debug",
            short: "d",
            description: "Turn on debugging output",
        }),
        verbose: flag({
            long: "verbose",
            short: "v",
            description: "Turn on verbose output",
        }),
        oneLow: option({
            long: "one-low",
            short: "o",
            description: "Low number of samples per cycle that correspond to a one [18]",
            type: optional(cycleLength),
        }),
        oneHigh: option({
            long: "one-high",
            short: "O",
            description: "High number of samples per cycle that correspond to a one [31]",
            type: optional(cycleLength),
        }),
        zeroLow: option({
            long: "zero-low",
            short: "z",
            description: "Low number of samples per cycle that correspond to a zero [32]",
            type: optional(cycleLength),
        }),
        zeroHigh: option({
            long: "zero-high",
            short: "Z",
            description: "High number of samples per cycle that correspond to a zero [inf]",
            type: optional(cycleLength),
        }),
        file: positional({
            type: string,
            displayName: "file",
            description: "16 bit 1 channel PCM .wav file of a cassette recording",
        }),
    },

    handler: (args) => {
        const thresholds = withDefaults({
            oneLow: args.oneLow,
            oneHigh: args.oneHigh,
            zeroLow: args.zeroLow,
            zeroHigh: args.zeroHigh,
        });

        const badThresholds = checkThresholds(thresholds);
        if (badThresholds) {
            console.error(badThresholds);
            process.exit(1);
        }

        try {
            const input = loadSamples(args.file);
            const decoder = new CassetteDecoder({
                thresholds,
                debug: args.debug,
                verbose: args.verbose,
                log: ConsoleLogHandler,
            });

            const output = decoder.decode(input.samples);
            for (const program of output.programs) {
                formatListing(program).forEach(line => console.log(line));
                if (args.verbose && program.header) {
                    describeNameBlock(program.header).forEach(line => console.log(line));
                }
                if (!program.complete) {
                    console.log("(recording ends before the end of file block)");
                }
            }

            if (output.error) {
                console.error(formatDecodeError(args.file, output.error));
                hexDump(output.error.payload).forEach(line => console.error(line));
                process.exit(1);
            }
        } catch (e) {
            if (e instanceof WavError) {
                console.error(`${args.file}: ${e.message}`);
                process.exit(1);
            }
            throw e;
        }

        process.exit(0);
    }
});

void run(cmd, process.argv.slice(2));
