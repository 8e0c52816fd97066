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

import { escapeByte, isPrintable } from "../utils/Strings.js";
import { FunctionTokens, StatementTokens } from "./tokens.js";

export const TokenBase = 0x80;

// exclusive: 0xDF (DSKI$) and 0xE0 (DSKO$) are in the table but listed as \xDF, \xE0
export const TokenLimit = 0xDF;
export const FunctionEscape = 0xFF;

function lookup(table: readonly string[], byte: number): string | undefined {
    return table[byte - TokenBase];
}

/**
 * Renders a tokenized BASIC line body as text.
 * Statement tokens are single bytes, function tokens are prefixed by 0xFF.
 */
export function detokenize(body: ArrayLike<number>): string {
    let text = "";

    for (let i = 0; i < body.length; i++) {
        const byte = body[i];

        if (isPrintable(byte)) {
            text += String.fromCharCode(byte);
            continue;
        }

        if (byte >= TokenBase && byte < TokenLimit) {
            text += lookup(StatementTokens, byte) ?? escapeByte(byte);
            continue;
        }

        if (byte == FunctionEscape && i + 1 < body.length) {
            const func = lookup(FunctionTokens, body[i + 1]);
            if (func !== undefined) {
                text += func;
                i++;
                continue;
            }
        }

        text += escapeByte(byte);
    }

    return text;
}
