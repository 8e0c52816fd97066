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

import { readFileSync } from "fs";

export const PcmFormat = 1;
export const RequiredSampleRate = 44100;
export const RequiredChannels = 1;
export const RequiredBitsPerSample = 16;

export interface SampleData {
    sampleRate: number;
    samples: Int16Array;
}

export class WavError extends Error {
    public constructor(msg: string) {
        super(msg);
        this.name = WavError.name;
    }
}

interface WavFormat {
    format: number;
    channels: number;
    sampleRate: number;
    bitsPerSample: number;
}

function fourCC(view: DataView, offset: number): string {
    let res = "";
    for (let i = 0; i < 4; i++) {
        res += String.fromCharCode(view.getUint8(offset + i));
    }
    return res;
}

function checkFormat(fmt: WavFormat) {
    if (fmt.format != PcmFormat) {
        throw new WavError(`Format type should be ${PcmFormat} (PCM), is ${fmt.format}`);
    }
    if (fmt.channels != RequiredChannels) {
        throw new WavError(`Number of channels should be ${RequiredChannels}, is ${fmt.channels}`);
    }
    if (fmt.sampleRate != RequiredSampleRate) {
        throw new WavError(`Sample rate should be ${RequiredSampleRate}, is ${fmt.sampleRate}`);
    }
    if (fmt.bitsPerSample != RequiredBitsPerSample) {
        throw new WavError(`Bits per sample should be ${RequiredBitsPerSample}, is ${fmt.bitsPerSample}`);
    }
}

/**
 * Parses a RIFF/WAVE image. Only mono 16 bit PCM at 44100 Hz is accepted,
 * anything else is rejected as a whole.
 */
export function parseWav(data: Uint8Array): SampleData {
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    if (data.length < 12 || fourCC(view, 0) != "RIFF" || fourCC(view, 8) != "WAVE") {
        throw new WavError("Not a RIFF/WAVE file");
    }

    let fmt: WavFormat | undefined;
    let offset = 12;
    while (offset + 8 <= data.length) {
        const id = fourCC(view, offset);
        const size = view.getUint32(offset + 4, true);
        const body = offset + 8;

        if (id == "fmt ") {
            if (size < 16 || body + size > data.length) {
                throw new WavError("Truncated fmt chunk");
            }
            fmt = {
                format: view.getUint16(body, true),
                channels: view.getUint16(body + 2, true),
                sampleRate: view.getUint32(body + 4, true),
                bitsPerSample: view.getUint16(body + 14, true),
            };
            checkFormat(fmt);
        } else if (id == "data") {
            if (!fmt) {
                throw new WavError("data chunk before fmt chunk");
            }
            if (body + size > data.length) {
                throw new WavError(`data chunk claims ${size} bytes, only ${data.length - body} present`);
            }

            const samples = new Int16Array(Math.floor(size / 2));
            for (let i = 0; i < samples.length; i++) {
                samples[i] = view.getInt16(body + i * 2, true);
            }
            return { sampleRate: fmt.sampleRate, samples };
        }

        // chunks are word aligned
        offset = body + size + (size & 1);
    }

    throw new WavError("No data chunk");
}

export function loadSamples(path: string): SampleData {
    return parseWav(readFileSync(path));
}
