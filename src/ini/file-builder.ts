// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Collects finished sections into an `IniFile`. Like the section builder it
 * is a value: each update returns a new builder.
 */

import { Chunk, Match, Option, pipe } from "effect";
import type { IniFile } from "./file";
import { type Section, isEmptySection } from "./section";
import { type SectionBuilder, buildSection } from "./section-builder";

export interface FileBuilder {
  readonly globalSection: Option.Option<Section>;
  /** Every named section in declaration order, duplicates included. */
  readonly sections: Chunk.Chunk<readonly [string, Section]>;
}

export const makeFileBuilder = (): FileBuilder => ({
  globalSection: Option.none(),
  sections: Chunk.empty(),
});

export const setGlobalSection =
  (section: Section) =>
  (builder: FileBuilder): FileBuilder => ({
    ...builder,
    globalSection: Option.some(section),
  });

export const newSection =
  (name: string, section: Section) =>
  (builder: FileBuilder): FileBuilder => ({
    ...builder,
    sections: Chunk.append(builder.sections, [name, section] as const),
  });

/**
 * Hands a finished section builder over to the file.
 *
 * The global section is implicit: every file starts in it, so an empty one is
 * an artifact of parsing and is dropped. A named section was opened by a
 * header the author wrote, so it is kept even with no entries.
 */
export const flushSection =
  (sectionBuilder: SectionBuilder) =>
  (builder: FileBuilder): FileBuilder => {
    const [id, section] = buildSection(sectionBuilder);
    return pipe(
      Match.value(id),
      Match.tag("Global", () =>
        isEmptySection(section) ? builder : setGlobalSection(section)(builder)
      ),
      Match.tag("Named", ({ name }) => newSection(name, section)(builder)),
      Match.exhaustive
    );
  };

/** Later declarations of a name replace earlier ones. */
export const buildFile = (builder: FileBuilder): IniFile => ({
  globalSection: builder.globalSection,
  sections: new Map(builder.sections),
});
