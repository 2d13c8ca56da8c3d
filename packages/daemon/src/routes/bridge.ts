/**
 * Bridge Routes
 *
 * POST /send                   Send a prompt to a provider's chat tab
 * GET  /status                 Daemon and per-provider status
 * GET  /status/:provider       One provider's status
 * POST /session/:provider/new  Start a fresh conversation
 * GET  /chats/:provider         Conversations in the provider's sidebar
 * GET  /chats/:provider/current The conversation the tab shows
 * POST /chats/:provider/switch  Open another conversation
 * GET  /pages                  Every open browser tab
 */

import { type BridgeErrorInfo, type BridgeErrorKind, toErrorInfo } from "@webchat/shared/bridge"
import type { FastifyInstance } from "fastify"
import { z } from "zod"

import type { BridgeService } from "../bridge-service.js"
import type { HealthStatus } from "../health/monitor.js"
import { uptimeSeconds } from "./health.js"

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

export const SendBodySchema = z.object({
  target: z
    .string()
    .trim()
    .min(1)
    .transform((t) => t.toLowerCase()),
  prompt: z.string().min(1).max(200_000),
  waitForResponse: z.boolean().default(true),
  timeoutSeconds: z.number().positive().max(3_600).optional(),
})

export type SendBody = z.infer<typeof SendBodySchema>

export const SwitchChatBodySchema = z.object({
  /** Chat URL, sidebar position, chat id or title fragment. */
  chat: z.string().trim().min(1),
})

interface ProviderParams {
  provider: string
}

// ---------------------------------------------------------------------------
// Error kind → HTTP status
// ---------------------------------------------------------------------------

const STATUS_FOR_KIND: Partial<Record<BridgeErrorKind, number>> = {
  TransportNotAttached: 404,
  ChatNotFound: 404,
  ProviderBusy: 409,
  ProviderUnavailable: 503,
  TransportUnreachable: 503,
  ResponseTimeout: 504,
}

function invalidRequest(error: z.ZodError) {
  return {
    error: "invalid_request",
    message: "Request body failed validation",
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  }
}

export function httpStatusFor(error: BridgeErrorInfo | undefined): number {
  if (!error) return 200
  return STATUS_FOR_KIND[error.kind] ?? 502
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export interface BridgeRouteDeps {
  service: BridgeService
  health: { getStatus(): HealthStatus }
  version: string
  startedAt: Date
}

export function bridgeRoutes(deps: BridgeRouteDeps) {
  const { service } = deps

  return function register(app: FastifyInstance): void {
    // -----------------------------------------------------------------
    // POST /send
    // -----------------------------------------------------------------
    app.post("/send", async (request, reply) => {
      const parsed = SendBodySchema.safeParse(request.body)
      if (!parsed.success) {
        return reply.status(400).send(invalidRequest(parsed.error))
      }

      const result = await service.send(parsed.data)
      if (!result.success) {
        request.log.warn(
          { target: parsed.data.target, error: result.metadata.error },
          "Send failed",
        )
      }
      return reply.status(httpStatusFor(result.metadata.error)).send(result)
    })

    // -----------------------------------------------------------------
    // GET /status
    // -----------------------------------------------------------------
    app.get("/status", async (_request, reply) => {
      return reply.send({
        daemon: {
          version: deps.version,
          uptimeSeconds: uptimeSeconds(deps.startedAt),
          providers: service.providers,
          health: deps.health.getStatus(),
        },
        providers: service.statusAll(),
      })
    })

    app.get<{ Params: ProviderParams }>("/status/:provider", async (request, reply) => {
      const provider = request.params.provider.toLowerCase()
      const snapshot = service.status(provider)
      if (!snapshot) {
        return reply
          .status(404)
          .send({ error: "not_found", message: `Unknown provider '${provider}'` })
      }
      return reply.send(snapshot)
    })

    // -----------------------------------------------------------------
    // POST /session/:provider/new
    // -----------------------------------------------------------------
    app.post<{ Params: ProviderParams }>("/session/:provider/new", async (request, reply) => {
      const result = await service.startNewSession(request.params.provider.toLowerCase())
      return reply.status(httpStatusFor(result.error)).send(result)
    })

    // -----------------------------------------------------------------
    // Chats
    // -----------------------------------------------------------------
    app.get<{ Params: ProviderParams }>("/chats/:provider", async (request, reply) => {
      const result = await service.listChats(request.params.provider.toLowerCase())
      return reply.status(httpStatusFor(result.error)).send(result)
    })

    app.get<{ Params: ProviderParams }>("/chats/:provider/current", async (request, reply) => {
      const result = await service.currentChat(request.params.provider.toLowerCase())
      return reply.status(httpStatusFor(result.error)).send(result)
    })

    app.post<{ Params: ProviderParams }>("/chats/:provider/switch", async (request, reply) => {
      const parsed = SwitchChatBodySchema.safeParse(request.body)
      if (!parsed.success) {
        return reply.status(400).send(invalidRequest(parsed.error))
      }

      const provider = request.params.provider.toLowerCase()
      const result = await service.switchChat(provider, parsed.data.chat)
      if (!result.success) {
        request.log.warn({ provider, chat: parsed.data.chat, error: result.error }, "Chat switch failed")
      }
      return reply.status(httpStatusFor(result.error)).send(result)
    })

    // -----------------------------------------------------------------
    // GET /pages
    // -----------------------------------------------------------------
    app.get("/pages", async (request, reply) => {
      try {
        const pages = await service.listPages()
        return reply.send({ pages })
      } catch (err) {
        const error = toErrorInfo(err, "dispatch")
        request.log.warn({ error }, "Listing pages failed")
        return reply.status(httpStatusFor(error)).send({ error })
      }
    })
  }
}
