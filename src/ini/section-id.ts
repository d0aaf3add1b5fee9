// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Where a section builder's entries will end up. Only lives during a parse;
 * a finished `IniFile` has no `SectionId` in it.
 */

import { Data } from "effect";

export type SectionId = Data.TaggedEnum<{
  Global: object;
  Named: { readonly name: string };
}>;

export const { Global, Named } = Data.taggedEnum<SectionId>();

export const globalId: SectionId = Global();
