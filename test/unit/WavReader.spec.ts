import { WavError, parseWav } from "../../src/audio/WavReader.js";

interface Chunk {
    id: string;
    body: Uint8Array;
    size?: number;
}

function ascii(text: string): number[] {
    return Array.from(text).map(c => c.charCodeAt(0));
}

function le(value: number, bytes: number): number[] {
    const res: number[] = [];
    for (let i = 0; i < bytes; i++) {
        res.push((value >> (8 * i)) & 0xFF);
    }
    return res;
}

function fmtChunk(format = 1, channels = 1, sampleRate = 44100, bitsPerSample = 16): Chunk {
    const blockAlign = channels * bitsPerSample / 8;
    return {
        id: "fmt ",
        body: new Uint8Array([
            ...le(format, 2), ...le(channels, 2), ...le(sampleRate, 4),
            ...le(sampleRate * blockAlign, 4), ...le(blockAlign, 2), ...le(bitsPerSample, 2),
        ]),
    };
}

function dataChunk(samples: number[]): Chunk {
    return { id: "data", body: new Uint8Array(samples.flatMap(s => le(s & 0xFFFF, 2))) };
}

function wav(chunks: Chunk[]): Uint8Array {
    const bytes: number[] = [];
    for (const chunk of chunks) {
        bytes.push(...ascii(chunk.id), ...le(chunk.size ?? chunk.body.length, 4), ...chunk.body);
        if (chunk.body.length & 1) {
            bytes.push(0);
        }
    }
    return new Uint8Array([...ascii("RIFF"), ...le(bytes.length + 4, 4), ...ascii("WAVE"), ...bytes]);
}

function wavError(image: Uint8Array): string | undefined {
    try {
        parseWav(image);
    } catch (e) {
        if (e instanceof WavError) {
            return e.message;
        }
        throw e;
    }
    return undefined;
}

describe("GIVEN a mono 16 bit WAV image", () => {
    describe("WHEN it only has fmt and data chunks", () => {
        const res = parseWav(wav([fmtChunk(), dataChunk([0, 8000, -8000, -1])]));

        test("THEN the samples should be read as signed little-endian words", () => {
            expect(res.sampleRate).toEqual(44100);
            expect(res.samples).toEqual(new Int16Array([0, 8000, -8000, -1]));
        });
    });

    describe("WHEN it has an odd sized chunk before the data", () => {
        const list: Chunk = { id: "LIST", body: new Uint8Array(ascii("INFOx")) };
        const res = parseWav(wav([fmtChunk(), list, dataChunk([100, -100])]));

        test("THEN the pad byte should be skipped", () => {
            expect(res.samples).toEqual(new Int16Array([100, -100]));
        });
    });

    describe("WHEN it is embedded in a larger buffer", () => {
        const image = wav([fmtChunk(), dataChunk([7])]);
        const buffer = new Uint8Array(image.length + 3);
        buffer.set(image, 3);
        const res = parseWav(buffer.subarray(3));

        test("THEN it should be read from its own offset", () => {
            expect(res.samples).toEqual(new Int16Array([7]));
        });
    });
});

describe("GIVEN an unsupported WAV image", () => {
    test("THEN compressed formats should be rejected", () => {
        expect(wavError(wav([fmtChunk(3), dataChunk([])]))).toEqual("Format type should be 1 (PCM), is 3");
    });

    test("THEN stereo should be rejected", () => {
        expect(wavError(wav([fmtChunk(1, 2), dataChunk([])]))).toEqual("Number of channels should be 1, is 2");
    });

    test("THEN other sample rates should be rejected", () => {
        expect(wavError(wav([fmtChunk(1, 1, 48000), dataChunk([])]))).toEqual("Sample rate should be 44100, is 48000");
    });

    test("THEN other sample sizes should be rejected", () => {
        expect(wavError(wav([fmtChunk(1, 1, 44100, 8), dataChunk([])]))).toEqual("Bits per sample should be 16, is 8");
    });
});

describe("GIVEN a malformed WAV image", () => {
    test("THEN a missing RIFF header should be rejected", () => {
        expect(wavError(new Uint8Array(ascii("RIFX\0\0\0\0WAVE")))).toEqual("Not a RIFF/WAVE file");
        expect(wavError(new Uint8Array(4))).toEqual("Not a RIFF/WAVE file");
    });

    test("THEN a short fmt chunk should be rejected", () => {
        const fmt: Chunk = { id: "fmt ", body: fmtChunk().body.subarray(0, 14) };
        expect(wavError(wav([fmt, dataChunk([])]))).toEqual("Truncated fmt chunk");
    });

    test("THEN data before the format should be rejected", () => {
        expect(wavError(wav([dataChunk([1]), fmtChunk()]))).toEqual("data chunk before fmt chunk");
    });

    test("THEN a data chunk longer than the file should be rejected", () => {
        const data: Chunk = { ...dataChunk([1, 2]), size: 100 };
        expect(wavError(wav([fmtChunk(), data]))).toEqual("data chunk claims 100 bytes, only 4 present");
    });

    test("THEN a file without data should be rejected", () => {
        expect(wavError(wav([fmtChunk()]))).toEqual("No data chunk");
    });
});
