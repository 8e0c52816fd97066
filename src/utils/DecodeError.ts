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

export class DecodeError extends Error {
    // sample position at which the run was stopped, filled in by the tape reader
    public sampleIdx?: number;

    // raw bytes of the block involved, for the diagnostic dump
    public payload: Uint8Array;

    public constructor(msg: string, payload?: Uint8Array) {
        super(msg);
        this.name = DecodeError.name;
        this.payload = payload ?? new Uint8Array(0);
    }
}

export class ChecksumError extends DecodeError {
    public read: number;
    public computed: number;

    public constructor(msg: string, read: number, computed: number, payload: Uint8Array) {
        super(msg, payload);
        this.name = ChecksumError.name;
        this.read = read;
        this.computed = computed;
    }
}

export class ListingError extends DecodeError {
    public constructor(msg: string, payload: Uint8Array) {
        super(msg, payload);
        this.name = ListingError.name;
    }
}

export function formatDecodeError(inputName: string, error: DecodeError) {
    if (error.sampleIdx === undefined) {
        return `${inputName}: ${error.message}`;
    }
    return `${inputName}:${error.sampleIdx}: ${error.message}`;
}
