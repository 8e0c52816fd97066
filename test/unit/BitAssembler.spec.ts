import { BitAssembler } from "../../src/demod/BitAssembler.js";
import { bytesToBits } from "../util.js";

describe("GIVEN a new bit assembler", () => {
    describe("WHEN hunting for a sync byte", () => {
        const bits = new BitAssembler();
        const results = bytesToBits([0x3C]).map(b => bits.push(b));

        test("THEN no window should be offered before 8 bits", () => {
            expect(results.slice(0, 7).every(r => r === undefined)).toBe(true);
        });

        test("THEN the 8th bit should complete the byte least significant bit first", () => {
            expect(results[7]).toEqual(0x3C);
        });

        test("THEN every further bit should slide the window", () => {
            expect(bits.push(1)).toEqual(0x9E);
            expect(bits.push(0)).toEqual(0x4F);
        });
    });

    describe("WHEN aligned", () => {
        const bits = new BitAssembler();
        bits.align();
        const results = bytesToBits([0xA5, 0x00]).map(b => bits.push(b));

        test("THEN it should not be hunting", () => {
            expect(bits.isHunting).toBe(false);
        });

        test("THEN bytes should be completed every 8 bits", () => {
            expect(results.filter(r => r !== undefined)).toEqual([0xA5, 0x00]);
            expect(results[7]).toEqual(0xA5);
            expect(results[15]).toEqual(0x00);
        });
    });
});
