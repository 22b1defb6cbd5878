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

import { InternalError, NotFoundError, ValidationError } from "@/errors";
import { toErrorResponse } from "@/web/app";

describe("toErrorResponse", () => {
  it("passes client-side application errors through", () => {
    expect(toErrorResponse(new NotFoundError("Cliente não encontrado"), false)).toEqual({
      status: 404,
      body: { success: false, error: "Cliente não encontrado" },
    });
    expect(toErrorResponse(new ValidationError("Nome é obrigatório"), false).status).toBe(400);
  });

  it("hides server-side messages unless details are exposed", () => {
    const error = new InternalError("Session token collision");

    expect(toErrorResponse(error, false)).toEqual({
      status: 500,
      body: { success: false, error: "Erro interno do servidor" },
    });
    expect(toErrorResponse(error, true).body.error).toBe("Session token collision");
  });

  it("keeps framework 4xx status codes", () => {
    const error = Object.assign(new Error("Body is not valid JSON"), { statusCode: 400 });

    expect(toErrorResponse(error, false)).toEqual({
      status: 400,
      body: { success: false, error: "Body is not valid JSON" },
    });
  });

  it("maps other errors to 500", () => {
    const unavailable = Object.assign(new Error("upstream"), { statusCode: 503 });

    expect(toErrorResponse(unavailable, false).status).toBe(500);
    expect(toErrorResponse(new Error("boom"), false).body.error).toBe("Erro interno do servidor");
  });
});
