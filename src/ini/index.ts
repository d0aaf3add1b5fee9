// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Public library surface: `parse` builds the whole model, `find` answers a
 * single lookup without building it.
 */

export { type Entries, type Entry, formatEntry, makeEntry } from "./entry";
export {
  type IniFile,
  getGlobalSection,
  getSectionByName,
  sectionNames,
} from "./file";
export {
  type FileBuilder,
  buildFile,
  flushSection,
  makeFileBuilder,
  newSection,
  setGlobalSection,
} from "./file-builder";
export { find } from "./find";
export { type IniFileJson, formatIniFile, toJson } from "./format";
export { type Classifier, type Line, classifyLine } from "./grammar";
export { parse } from "./parse";
export { type Section, emptySection, getValueByKey, isEmptySection } from "./section";
export {
  type SectionBuilder,
  addEntry,
  addKeyValuePair,
  buildSection,
  makeSectionBuilder,
} from "./section-builder";
export { Global, Named, type SectionId, globalId } from "./section-id";
export { GrammarError } from "../lib/errors";
