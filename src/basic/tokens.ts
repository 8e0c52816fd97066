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

// Color BASIC keywords followed by the Disk BASIC additions, indexed by code - 0x80
export const StatementTokens: readonly string[] = [
    "FOR", "GO", "REM", "'", "ELSE", "IF", "DATA", "PRINT",
    "ON", "INPUT", "END", "NEXT", "DIM", "READ", "RUN", "RESTORE",
    "RETURN", "STOP", "POKE", "CONT", "LIST", "CLEAR", "NEW", "CLOAD",
    "CSAVE", "OPEN", "CLOSE", "LLIST", "SET", "RESET", "CLS", "MOTOR",
    "SOUND", "AUDIO", "EXEC", "SKIPF", "TAB(", "TO", "SUB", "THEN",
    "NOT", "STEP", "OFF", "+", "-", "*", "/", "^",
    "AND", "OR", ">", "=", "<", "DEL", "EDIT", "TRON",
    "TROFF", "DEF", "LET", "LINE", "PCLS", "PSET", "PRESET", "SCREEN",
    "PCLEAR", "COLOR", "CIRCLE", "PAINT", "GET", "PUT", "DRAW", "PCOPY",
    "PMODE", "PLAY", "DLOAD", "RENUM", "FN", "USING", "DIR", "DRIVE",
    "FIELD", "FILES", "KILL", "LOAD", "LSET", "MERGE", "RENAME", "RSET",
    "SAVE", "WRITE", "VERIFY", "UNLOAD", "DSKINI", "BACKUP", "COPY", "DSKI$",
    "DSKO$",
];

// functions follow a 0xFF escape, also indexed by code - 0x80
export const FunctionTokens: readonly string[] = [
    "SGN", "INT", "ABS", "USR", "RND", "SIN", "PEEK", "LEN",
    "STR$", "VAL", "ASC", "CHR$", "EOF", "JOYSTK", "LEFT$", "RIGHT$",
    "MID$", "POINT", "INKEY$", "MEM", "ATN", "COS", "TAN", "EXP",
    "FIX", "LOG", "POS", "SQR", "HEX$", "VARPTR", "INSTR", "TIMER",
    "PPOINT", "STRING$", "CVN", "FREE", "LOC", "LOF", "MKN$",
];
