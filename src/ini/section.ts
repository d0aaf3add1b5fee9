// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Array as Arr, Option, pipe } from "effect";
import { type Entries, formatEntry } from "./entry";

/**
 * Ordered entries of one section. Duplicate keys are all kept; lookups see
 * only the first one.
 */
export interface Section {
  readonly entries: Entries;
}

export const emptySection: Section = { entries: [] };

export const getValueByKey = (section: Section, key: string): Option.Option<string> =>
  pipe(
    section.entries,
    Arr.findFirst((entry) => entry.key === key),
    Option.map((entry) => entry.value)
  );

export const isEmptySection = (section: Section): boolean => section.entries.length === 0;

export const formatSectionBody = (section: Section): readonly string[] =>
  Arr.map(section.entries, formatEntry);
