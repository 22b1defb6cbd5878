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
 * Page-number pagination over findMany/count.
 */

export interface PageRequest {
  page?: number;
  perPage?: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  pages: number;
  page: number;
  perPage: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface PageWindow {
  page: number;
  perPage: number;
  limit: number;
  offset: number;
}

export const DEFAULT_PER_PAGE = 50;
export const MAX_PER_PAGE = 100;
export const MAX_PAGE = 1_000_000;

/** Pages are 1-based and clamped to [1, MAX_PAGE]; perPage is clamped to [1, MAX_PER_PAGE]. */
export function pageWindow(request: PageRequest = {}): PageWindow {
  const requested = request.page !== undefined && Number.isFinite(request.page) ? request.page : 1;
  const page = Math.min(MAX_PAGE, Math.max(1, Math.trunc(requested)));
  const perPageRequested =
    request.perPage !== undefined && Number.isFinite(request.perPage)
      ? request.perPage
      : DEFAULT_PER_PAGE;
  const perPage = Math.min(MAX_PER_PAGE, Math.max(1, Math.trunc(perPageRequested)));
  return { page, perPage, limit: perPage, offset: (page - 1) * perPage };
}

export function toPage<T>(items: T[], total: number, window: PageWindow): Page<T> {
  const pages = Math.ceil(total / window.perPage);
  return {
    items,
    total,
    pages,
    page: window.page,
    perPage: window.perPage,
    hasNext: window.page < pages,
    hasPrev: window.page > 1,
  };
}
