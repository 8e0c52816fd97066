import { LeaderByte, SyncByte } from "../src/blocks/BlockReader.js";
import type { LogHandler } from "../src/utils/Log.js";

export const OneCycle = 18;
export const ZeroCycle = 36;
const Amplitude = 8000;

export function checksum(bytes: number[]): number {
    return bytes.reduce((sum, b) => (sum + b) & 0xFF, 0);
}

// leader, sync, type, length, body, checksum, leader
export function frame(type: number, body: number[], sum?: number): number[] {
    const header = [type, body.length];
    return [LeaderByte, SyncByte, ...header, ...body, sum ?? checksum([...header, ...body]), LeaderByte];
}

export function nameFrame(name: string, fileType = 0, asciiFlag = 0, gapFlag = 0): number[] {
    const nameBytes = Array.from(name.padEnd(8, " ")).map(c => c.charCodeAt(0));
    return frame(0x00, [...nameBytes, fileType, asciiFlag, gapFlag, 0x00, 0x00, 0x00, 0x00]);
}

export function bytesToBits(bytes: number[]): (0 | 1)[] {
    const bits: (0 | 1)[] = [];
    for (const byte of bytes) {
        for (let i = 0; i < 8; i++) {
            bits.push((byte >> i) & 1 ? 1 : 0);
        }
    }
    return bits;
}

/**
 * Builds a waveform whose falling zero crossings are exactly the given cycle lengths apart.
 * Every cycle starts with its negative half, one trailing negative sample closes the last one.
 */
export function cyclesToSamples(cycles: number[]): Int16Array {
    const samples: number[] = new Array<number>(10).fill(Amplitude);
    for (const len of cycles) {
        const low = Math.floor(len / 2);
        for (let i = 0; i < len; i++) {
            samples.push(i < low ? -Amplitude : Amplitude);
        }
    }
    samples.push(-Amplitude);
    return new Int16Array(samples);
}

export function synthesize(bytes: number[]): Int16Array {
    return cyclesToSamples(bytesToBits(bytes).map(b => b ? OneCycle : ZeroCycle));
}

export interface RecordedLog extends LogHandler {
    debugs: string[];
    infos: string[];
    warnings: string[];
}

export function recordingLog(): RecordedLog {
    const log: RecordedLog = {
        debugs: [],
        infos: [],
        warnings: [],
        debug: msg => log.debugs.push(msg),
        info: msg => log.infos.push(msg),
        warn: msg => log.warnings.push(msg),
    };
    return log;
}
