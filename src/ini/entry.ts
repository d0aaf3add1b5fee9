// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * INI entry - the fundamental unit of a parsed file. Keys and values are
 * non-empty and never contain `=` or whitespace; the grammar guarantees it.
 */

export interface Entry {
  readonly key: string;
  readonly value: string;
}

/**
 * Type alias for a collection of entries.
 */
export type Entries = readonly Entry[];

export const makeEntry = (key: string, value: string): Entry => ({ key, value });

export const formatEntry = ({ key, value }: Entry): string => `${key}=${value}`;
