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
 * Room-scoped chat message persistence.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import type { StorageAdapter } from "../storage/adapter";
import { RecordCodec } from "../storage/record-codec";
import type { RangeCondition } from "../storage/types";

export const MESSAGES_COLLECTION = "chat_messages";

export const MessageKindSchema = z.enum(["text", "image", "file", "system"]);

export type MessageKind = z.infer<typeof MessageKindSchema>;

export const ChatMessageSchema = z.object({
  id: z.number().int(),
  accountId: z.number().int().nullable(),
  room: z.string(),
  author: z.string(),
  text: z.string(),
  kind: MessageKindSchema,
  sentAt: z.string(),
  edited: z.boolean(),
  deleted: z.boolean(),
  replyTo: z.number().int().nullable(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export interface NewChatMessage {
  text: string;
  author?: string;
  room?: string;
  accountId?: number | null;
  kind?: MessageKind;
  replyTo?: number | null;
}

export interface ChatHistoryQuery {
  room?: string;
  limit?: number;
  /** Only messages sent strictly before this ISO-8601 instant. */
  before?: string;
}

export const ANONYMOUS_AUTHOR = "Anonymous";

const codec = new RecordCodec(MESSAGES_COLLECTION, ChatMessageSchema);

export interface MessageRepositoryOptions {
  defaultRoom: string;
  maxHistory: number;
  now?: () => Date;
}

export class MessageRepository {
  private readonly now: () => Date;

  constructor(
    private readonly storage: StorageAdapter,
    private readonly options: MessageRepositoryOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async save(message: NewChatMessage): Promise<ChatMessage> {
    const text = message.text.trim();
    if (!text) {
      throw new ValidationError("Message text is required");
    }

    const created = await this.storage.create(MESSAGES_COLLECTION, {
      accountId: message.accountId ?? null,
      room: message.room || this.options.defaultRoom,
      author: message.author?.trim() || ANONYMOUS_AUTHOR,
      text,
      kind: message.kind ?? "text",
      sentAt: this.now().toISOString(),
      edited: false,
      deleted: false,
      replyTo: message.replyTo ?? null,
    });
    return codec.decode(created);
  }

  /** The newest `limit` non-deleted messages of a room, oldest first. */
  async list(query: ChatHistoryQuery = {}): Promise<ChatMessage[]> {
    const requested = query.limit !== undefined && Number.isFinite(query.limit) ? query.limit : 100;
    const limit = Math.min(Math.max(Math.trunc(requested), 1), this.options.maxHistory);
    const range: RangeCondition[] = query.before ? [{ field: "sentAt", lt: query.before }] : [];

    const records = await this.storage.findMany(MESSAGES_COLLECTION, {
      where: { room: query.room || this.options.defaultRoom, deleted: false },
      range,
      orderBy: [{ field: "id", direction: "desc" }],
      limit,
    });
    return codec.decodeAll(records).reverse();
  }

  countSince(since: string): Promise<number> {
    return this.storage.count(MESSAGES_COLLECTION, { range: [{ field: "sentAt", gte: since }] });
  }
}
