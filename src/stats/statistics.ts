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

import type { AccountRepository } from "../accounts/account-repository";
import type { MessageRepository } from "../chat/message-repository";
import type { ConnectionRepository } from "../connections/connection-repository";
import type { DeviceRepository } from "../devices/device-repository";
import type { SessionRegistry } from "../sessions/session-registry";

const RECENT_ACCESS_WINDOW_MS = 30 * 60 * 1000;

export interface Statistics {
  totalAccounts: number;
  /** Accounts with a last access in the past 30 minutes. */
  recentlyActiveAccounts: number;
  totalDevices: number;
  devicesOnline: number;
  totalConnections: number;
  /** Messages sent since midnight UTC. */
  messagesToday: number;
  activeSessions: number;
}

export interface StatisticsSources {
  accounts: AccountRepository;
  devices: DeviceRepository;
  connections: ConnectionRepository;
  messages: MessageRepository;
  sessions: SessionRegistry;
}

function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export class StatisticsService {
  private readonly now: () => Date;

  constructor(
    private readonly sources: StatisticsSources,
    options: { now?: () => Date } = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async collect(): Promise<Statistics> {
    const now = this.now();
    const recentSince = new Date(now.getTime() - RECENT_ACCESS_WINDOW_MS).toISOString();
    const { accounts, devices, connections, messages, sessions } = this.sources;

    const [
      totalAccounts,
      recentlyActiveAccounts,
      totalDevices,
      devicesOnline,
      totalConnections,
      messagesToday,
      activeSessions,
    ] = await Promise.all([
      accounts.count(),
      accounts.countAccessedSince(recentSince),
      devices.count(),
      devices.countOnline(),
      connections.count(),
      messages.countSince(startOfUtcDay(now).toISOString()),
      sessions.countActive(),
    ]);

    return {
      totalAccounts,
      recentlyActiveAccounts,
      totalDevices,
      devicesOnline,
      totalConnections,
      messagesToday,
      activeSessions,
    };
  }
}
