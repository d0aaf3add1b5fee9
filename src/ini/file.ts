// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The parsed model: an optional global section (entries before any header)
 * plus named sections. Names are unique; when a file declares the same name
 * twice, the later body is the one stored.
 */

import { Option } from "effect";
import type { Section } from "./section";

export interface IniFile {
  readonly globalSection: Option.Option<Section>;
  /** Iteration order is the order names were first declared. */
  readonly sections: ReadonlyMap<string, Section>;
}

export const getGlobalSection = (file: IniFile): Option.Option<Section> => file.globalSection;

export const getSectionByName = (file: IniFile, name: string): Option.Option<Section> =>
  Option.fromNullable(file.sections.get(name));

export const sectionNames = (file: IniFile): readonly string[] => Array.from(file.sections.keys());
