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

// A one is one cycle of 2400 Hz, a zero one cycle of 1200 Hz. At 44100 Hz that is
// about 18.4 and 36.8 samples per cycle, but recordings drift so ranges are used.
export enum CycleClass {
    Zero,
    One,
    Invalid,
}

export interface CycleThresholds {
    oneLow: number;
    oneHigh: number;
    zeroLow: number;
    zeroHigh: number;
}

export const DefaultThresholds: Readonly<CycleThresholds> = {
    oneLow: 18,
    oneHigh: 31,
    zeroLow: 32,
    zeroHigh: Infinity,
};

export function withDefaults(thresholds: Partial<CycleThresholds> = {}): CycleThresholds {
    return {
        oneLow: thresholds.oneLow ?? DefaultThresholds.oneLow,
        oneHigh: thresholds.oneHigh ?? DefaultThresholds.oneHigh,
        zeroLow: thresholds.zeroLow ?? DefaultThresholds.zeroLow,
        zeroHigh: thresholds.zeroHigh ?? DefaultThresholds.zeroHigh,
    };
}

/**
 * Checks that the ranges are usable: the one range must start above zero and
 * neither range may be empty or overlap the other.
 * @returns a description of the first problem found
 */
export function checkThresholds(t: CycleThresholds): string | undefined {
    if (t.oneLow <= 0) {
        return "Low cycle length of a one must be positive";
    }
    if (t.oneLow > t.oneHigh) {
        return `One range is empty: ${t.oneLow} > ${t.oneHigh}`;
    }
    if (t.zeroLow > t.zeroHigh) {
        return `Zero range is empty: ${t.zeroLow} > ${t.zeroHigh}`;
    }
    if (t.oneLow <= t.zeroHigh && t.zeroLow <= t.oneHigh) {
        return `One range ${t.oneLow}-${t.oneHigh} overlaps zero range ${t.zeroLow}-${t.zeroHigh}`;
    }
    return undefined;
}

export function classifyCycle(cycleLength: number, thresholds: CycleThresholds): CycleClass {
    if (cycleLength >= thresholds.oneLow && cycleLength <= thresholds.oneHigh) {
        return CycleClass.One;
    } else if (cycleLength >= thresholds.zeroLow && cycleLength <= thresholds.zeroHigh) {
        return CycleClass.Zero;
    } else {
        return CycleClass.Invalid;
    }
}

/**
 * Measures the distance between falling zero crossings, i.e. a negative sample
 * directly following a non-negative one.
 */
export class ZeroCrossingCounter {
    private prev?: number;
    private count?: number;

    /**
     * Feeds the next sample.
     * @returns the cycle length in samples if this sample closed a cycle
     */
    public push(sample: number): number | undefined {
        const prev = this.prev;
        this.prev = sample;

        if (this.count !== undefined) {
            this.count++;
        }

        if (prev === undefined || sample >= 0 || prev < 0) {
            return undefined;
        }

        // the first crossing only starts the count
        const cycleLength = this.count;
        this.count = 0;
        return cycleLength;
    }
}
