import { escapeByte, hexDump, isPrintable, toHex } from "../../src/utils/Strings.js";

describe("GIVEN a number", () => {
    test("THEN it should be shown as upper case hex of the given width", () => {
        expect(toHex(0x0A)).toEqual("0A");
        expect(toHex(0x3C)).toEqual("3C");
        expect(toHex(0xE00, 4)).toEqual("0E00");
    });

    test("THEN escaped bytes should use the hex notation", () => {
        expect(escapeByte(0xFF)).toEqual("\\xFF");
        expect(escapeByte(0x01)).toEqual("\\x01");
    });

    test("THEN only 7 bit ASCII without controls should be printable", () => {
        expect(isPrintable(0x1F)).toBe(false);
        expect(isPrintable(0x20)).toBe(true);
        expect(isPrintable(0x7E)).toBe(true);
        expect(isPrintable(0x7F)).toBe(false);
        expect(isPrintable(0x80)).toBe(false);
    });
});

describe("GIVEN a hex dump", () => {
    describe("WHEN the data is shorter than a line", () => {
        const dump = hexDump(new Uint8Array([0x41, 0x42, 0x00]));

        test("THEN the hex column should be padded", () => {
            expect(dump).toEqual(["00000000 41 42 00 " + " ".repeat(39) + " |  AB."]);
        });
    });

    describe("WHEN lines repeat", () => {
        const data = new Uint8Array(49);
        data[48] = 0x41;
        const dump = hexDump(data);
        const zeros = "00 ".repeat(16) + " |  " + ".".repeat(16);

        test("THEN the repetitions should be folded", () => {
            expect(dump).toEqual([
                "00000000 " + zeros,
                "    Last line repeated 2 time(s)",
                "00000030 41 " + " ".repeat(45) + " |  A",
            ]);
        });
    });

    describe("WHEN the data ends in repeated lines", () => {
        const dump = hexDump(new Uint8Array(32));

        test("THEN the repeat note should come last", () => {
            expect(dump).toEqual([
                "00000000 " + "00 ".repeat(16) + " |  " + ".".repeat(16),
                "    Last line repeated 1 time(s)",
            ]);
        });
    });

    describe("WHEN the data is empty", () => {
        test("THEN the dump should be empty", () => {
            expect(hexDump(new Uint8Array(0))).toEqual([]);
        });
    });
});
