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
 * bcrypt password hashing.
 */

import bcrypt from "bcryptjs";

export class PasswordHasher {
  private dummyHash: Promise<string> | null = null;

  constructor(private readonly rounds: number) {}

  hash(rawPassword: string): Promise<string> {
    return bcrypt.hash(rawPassword, this.rounds);
  }

  verify(rawPassword: string, hash: string): Promise<boolean> {
    return bcrypt.compare(rawPassword, hash);
  }

  /**
   * Runs a comparison against a throwaway hash of the same cost, so a lookup miss
   * takes as long as a wrong password. Always resolves false.
   */
  async verifyDummy(rawPassword: string): Promise<false> {
    this.dummyHash ??= this.hash("placeholder-password");
    await bcrypt.compare(rawPassword, await this.dummyHash);
    return false;
  }
}
