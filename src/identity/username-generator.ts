// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Human-readable usernames: adjective + noun + three-digit number, e.g. "SwiftOtter482".
 */

import { randomInt as cryptoRandomInt } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";

const WordListSchema = z.object({
  adjectives: z.array(z.string().min(1)).min(1),
  nouns: z.array(z.string().min(1)).min(1),
});

export type WordList = z.infer<typeof WordListSchema>;

/** Returns an integer in [0, maxExclusive). */
export type RandomInt = (maxExclusive: number) => number;

export function loadWordList(url: URL = new URL("./names.json", import.meta.url)): WordList {
  return WordListSchema.parse(JSON.parse(readFileSync(url, "utf-8")));
}

export class UsernameGenerator {
  constructor(
    private readonly words: WordList = loadWordList(),
    private readonly randomInt: RandomInt = (max) => cryptoRandomInt(max),
  ) {}

  next(): string {
    const adjective = this.pick(this.words.adjectives);
    const noun = this.pick(this.words.nouns);
    const number = 100 + this.randomInt(900);
    return `${adjective}${noun}${number}`;
  }

  private pick(list: readonly string[]): string {
    const word = list[this.randomInt(list.length)];
    if (word === undefined) {
      throw new RangeError("Random index out of range");
    }
    return word;
  }
}
