// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * INI serialization of a parsed file. Output re-parses to an equivalent file:
 * global entries first, then each named section under its header. Empty
 * named sections keep their header so the section set survives the trip.
 */

import { Array as Arr, Option, pipe } from "effect";
import type { Entries } from "./entry";
import type { IniFile } from "./file";
import { type Section, formatSectionBody } from "./section";

export const formatNamedSection = (name: string, section: Section): string =>
  [`[${name}]`, ...formatSectionBody(section)].join("\n");

export const formatIniFile = (file: IniFile): string => {
  const global = pipe(
    file.globalSection,
    Option.map((section) => formatSectionBody(section).join("\n")),
    Option.toArray
  );
  const named = Arr.map(Array.from(file.sections), ([name, section]) =>
    formatNamedSection(name, section)
  );
  const blocks = [...global, ...named];
  return blocks.length === 0 ? "" : `${blocks.join("\n\n")}\n`;
};

/** Plain-object view used for JSON output; every entry is kept, duplicates included. */
export interface IniFileJson {
  readonly global: Entries | null;
  readonly sections: Readonly<Record<string, Entries>>;
}

export const toJson = (file: IniFile): IniFileJson => ({
  global: pipe(
    file.globalSection,
    Option.map((section) => section.entries),
    Option.getOrNull
  ),
  sections: Object.fromEntries(
    Arr.map(Array.from(file.sections), ([name, section]) => [name, section.entries] as const)
  ),
});
