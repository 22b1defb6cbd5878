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
 * JSON views in the wire format the clients expect. Password hashes and full
 * session tokens never leave through these.
 */

import type { Account } from "../accounts/types";
import type { AuditEntry } from "../audit/audit-types";
import type { ChatMessage, MessageKind } from "../chat/message-repository";
import type { Connection } from "../connections/connection-repository";
import type { Device, DeviceWithStatus } from "../devices/types";
import type { IpIdentity } from "../identity/types";
import type { Statistics } from "../stats/statistics";
import type { Page } from "../storage/paging";

export const REMOVED_MESSAGE_TEXT = "[Mensagem removida]";

const MESSAGE_KIND_LABELS: Record<MessageKind, string> = {
  text: "texto",
  image: "imagem",
  file: "arquivo",
  system: "sistema",
};

export function accountView(account: Account, totalDevices: number) {
  return {
    id: account.id,
    nome: account.name,
    email: account.email,
    telefone: account.phone,
    empresa: account.company,
    cargo: account.jobTitle,
    endereco: account.address,
    cidade: account.city,
    estado: account.state,
    pais: account.country,
    cep: account.postalCode,
    cpf_cnpj: account.taxId,
    ativo: account.active,
    nivel_acesso: account.accessLevel,
    data_cadastro: account.createdAt,
    ultimo_acesso: account.lastAccessAt,
    observacoes: account.notes,
    dados_extras: account.extra,
    total_dispositivos: totalDevices,
  };
}

export type AccountView = ReturnType<typeof accountView>;

export function deviceView(device: Device | DeviceWithStatus) {
  return {
    id: device.id,
    cliente_id: device.accountId,
    nome: device.name,
    tipo: device.type,
    sistema_operacional: device.operatingSystem,
    versao_so: device.osVersion,
    hostname: device.hostname,
    ip_local: device.localIp,
    ip_publico: device.publicIp,
    mac_address: device.macAddress,
    processador: device.processor,
    memoria_total: device.memoryTotal,
    disco_total: device.diskTotal,
    is_virtual: device.isVirtual,
    virtual_type: device.virtualType,
    ativo: device.active,
    ultimo_heartbeat: device.lastHeartbeatAt,
    data_registro: device.registeredAt,
    info_extra: device.extra,
    ...("online" in device ? { online: device.online } : {}),
  };
}

export function connectionView(connection: Connection) {
  return {
    id: connection.id,
    cliente_id: connection.accountId,
    dispositivo_id: connection.deviceId,
    ip_origem: connection.sourceIp,
    ip_destino: connection.destinationIp,
    porta_origem: connection.sourcePort,
    porta_destino: connection.destinationPort,
    protocolo: connection.protocol,
    status: connection.status,
    processo: connection.processName,
    pid: connection.pid,
    data_hora: connection.observedAt,
    duracao_segundos: connection.durationSeconds,
    bytes_enviados: connection.bytesSent,
    bytes_recebidos: connection.bytesReceived,
  };
}

export function messageView(message: ChatMessage) {
  return {
    id: message.id,
    cliente_id: message.accountId,
    sala: message.room,
    usuario: message.author,
    mensagem: message.deleted ? REMOVED_MESSAGE_TEXT : message.text,
    tipo: MESSAGE_KIND_LABELS[message.kind],
    data_hora: message.sentAt,
    editada: message.edited,
    deletada: message.deleted,
    resposta_para: message.replyTo,
  };
}

export function auditEntryView(entry: AuditEntry) {
  return {
    id: entry.id,
    cliente_id: entry.accountId,
    acao: entry.action,
    descricao: entry.description,
    ip_address: entry.ipAddress,
    data_hora: entry.createdAt,
    nivel: entry.severity,
    dados: entry.payload,
  };
}

export function statisticsView(stats: Statistics) {
  return {
    total_clientes: stats.totalAccounts,
    clientes_ativos: stats.recentlyActiveAccounts,
    total_dispositivos: stats.totalDevices,
    dispositivos_online: stats.devicesOnline,
    total_conexoes: stats.totalConnections,
    mensagens_hoje: stats.messagesToday,
    sessoes_ativas: stats.activeSessions,
  };
}

export function identityDataView(identity: IpIdentity) {
  return {
    username: identity.username,
    ip: identity.ip,
    created_at: identity.firstSeenAt,
    last_seen: identity.lastSeenAt,
    total_visits: identity.visits,
    system_info: identity.metadata,
  };
}

/** Paged listing under `key`, with the totals the clients read. */
export function pageView<T, V>(key: string, page: Page<T>, view: (item: T) => V) {
  return {
    success: true,
    [key]: page.items.map(view),
    total: page.total,
    paginas: page.pages,
    pagina_atual: page.page,
  };
}

/** First 16 characters of a token, for display. */
export function truncateToken(token: string): string {
  return `${token.slice(0, 16)}...`;
}
