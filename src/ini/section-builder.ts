// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Accumulates the entries of the section currently being parsed. Every update
 * returns a new builder, so a builder handed on is never changed behind the
 * holder's back.
 */

import { Chunk } from "effect";
import { type Entry, makeEntry } from "./entry";
import type { Section } from "./section";
import type { SectionId } from "./section-id";

export interface SectionBuilder {
  readonly id: SectionId;
  readonly entries: Chunk.Chunk<Entry>;
}

export const makeSectionBuilder = (id: SectionId): SectionBuilder => ({
  id,
  entries: Chunk.empty(),
});

export const addEntry =
  (entry: Entry) =>
  (builder: SectionBuilder): SectionBuilder => ({
    ...builder,
    entries: Chunk.append(builder.entries, entry),
  });

export const addKeyValuePair = (
  key: string,
  value: string
): ((builder: SectionBuilder) => SectionBuilder) => addEntry(makeEntry(key, value));

export const buildSection = (builder: SectionBuilder): readonly [SectionId, Section] => [
  builder.id,
  { entries: Chunk.toReadonlyArray(builder.entries) },
];
