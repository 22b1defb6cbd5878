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
 * Wires the domain components around one storage adapter.
 */

import { AccountRepository } from "./accounts/account-repository";
import { AccountService } from "./accounts/account-service";
import { CredentialStore } from "./accounts/credential-store";
import { PasswordHasher } from "./accounts/password-hasher";
import { AuditLogger } from "./audit/audit-logger";
import { MessageRepository } from "./chat/message-repository";
import type { AppConfig } from "./config/schema";
import { ConnectionRepository } from "./connections/connection-repository";
import { DeviceRepository } from "./devices/device-repository";
import { IpIdentityAssigner } from "./identity/ip-identity-assigner";
import type { UsernameGenerator } from "./identity/username-generator";
import { SessionRegistry } from "./sessions/session-registry";
import { StatisticsService } from "./stats/statistics";
import type { StorageAdapter } from "./storage/adapter";

export interface Services {
  storage: StorageAdapter;
  audit: AuditLogger;
  accounts: AccountRepository;
  credentials: CredentialStore;
  accountService: AccountService;
  sessions: SessionRegistry;
  identities: IpIdentityAssigner;
  devices: DeviceRepository;
  connections: ConnectionRepository;
  messages: MessageRepository;
  statistics: StatisticsService;
}

export interface ServiceOverrides {
  now?: () => Date;
  usernames?: UsernameGenerator;
  generateToken?: () => string;
}

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

/**
 * Builds every component and declares the unique indexes they rely on.
 * The storage adapter must already be initialized.
 */
export async function createServices(
  storage: StorageAdapter,
  config: AppConfig,
  overrides: ServiceOverrides = {},
): Promise<Services> {
  const now = overrides.now;

  const audit = new AuditLogger(storage, { maxQueryLimit: config.audit.maxQueryLimit, now });
  const hasher = new PasswordHasher(config.passwords.bcryptRounds);
  const accounts = new AccountRepository(storage);
  const sessions = new SessionRegistry(storage, accounts, audit, {
    ttlMs: config.sessions.ttlHours * HOUR_MS,
    now,
    generateToken: overrides.generateToken,
  });
  const devices = new DeviceRepository(storage, audit, {
    onlineWindowMs: config.devices.onlineWindowMinutes * MINUTE_MS,
    now,
  });
  const connections = new ConnectionRepository(storage, { now });
  const messages = new MessageRepository(storage, {
    defaultRoom: config.chat.defaultRoom,
    maxHistory: config.chat.maxHistory,
    now,
  });
  const identities = new IpIdentityAssigner(storage, audit, {
    usernames: overrides.usernames,
    now,
  });

  await accounts.ensureIndexes();
  await sessions.ensureIndexes();
  await identities.ensureIndexes();

  return {
    storage,
    audit,
    accounts,
    credentials: new CredentialStore(accounts, hasher, audit, {
      defaultCountry: config.accounts.defaultCountry,
      now,
    }),
    accountService: new AccountService(storage, accounts, sessions, devices, hasher, audit),
    sessions,
    identities,
    devices,
    connections,
    messages,
    statistics: new StatisticsService(
      { accounts, devices, connections, messages, sessions },
      { now },
    ),
  };
}
