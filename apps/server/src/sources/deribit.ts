import WebSocket from "ws";
import { z } from "zod";
import { UpstreamError } from "../batch/errors";
import { createLogger, type Logger } from "../logging/logger";

type Pending = { resolve: (v: unknown) => void; reject: (e: Error) => void; timer: NodeJS.Timeout };

export type DeribitNetwork = "mainnet" | "testnet";

export function networkUrl(net: DeribitNetwork) {
  return net === "testnet"
    ? "wss://test.deribit.com/ws/api/v2"
    : "wss://www.deribit.com/ws/api/v2";
}

const RpcReplySchema = z.object({
  id: z.number().optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

export const BookSummaryRowSchema = z.object({
  instrument_name: z.string(),
  mark_iv: z.number().nullable().optional(),
  underlying_price: z.number().nullable().optional(),
  open_interest: z.number().nullable().optional(),
});

export type BookSummaryRow = z.infer<typeof BookSummaryRowSchema>;

/**
 * Minimal JSON-RPC client over Deribit's public websocket. One instance per
 * fetch; `close()` rejects whatever is still pending.
 */
export class DeribitWS {
  private ws: WebSocket | null = null;
  private id = 1;
  private pending = new Map<number, Pending>();

  constructor(
    private readonly network: DeribitNetwork,
    private readonly rpcTimeoutMs = 10_000,
    private readonly log: Logger = createLogger("deribit")
  ) {}

  async connect(signal?: AbortSignal): Promise<void> {
    const url = networkUrl(this.network);
    const ws = new WebSocket(url);
    this.ws = ws;

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(new UpstreamError("connect aborted", "network"));
      signal?.addEventListener("abort", onAbort, { once: true });
      ws.once("open", () => {
        signal?.removeEventListener("abort", onAbort);
        this.log.debug("ws open:", url);
        resolve();
      });
      ws.once("error", (e) => {
        signal?.removeEventListener("abort", onAbort);
        reject(new UpstreamError(`ws open error: ${e.message}`, "network", { cause: e }));
      });
    });

    ws.on("error", (e) => this.log.error("ws error:", e.message));
    ws.on("close", (code, reason) => {
      this.log.debug("ws closed", code, reason.toString());
      this.failPending(new UpstreamError("socket closed", "network"));
    });
    ws.on("message", (buf) => this.onMessage(buf.toString()));
  }

  private onMessage(text: string) {
    let msg: z.infer<typeof RpcReplySchema>;
    try {
      msg = RpcReplySchema.parse(JSON.parse(text));
    } catch (err) {
      this.log.warn("unparseable message dropped:", String(err));
      return;
    }
    if (msg.id === undefined) return;
    const p = this.pending.get(msg.id);
    if (!p) return;
    this.pending.delete(msg.id);
    clearTimeout(p.timer);
    if (msg.error) {
      p.reject(new UpstreamError(`rpc error ${msg.error.code}: ${msg.error.message}`, "not_found"));
    } else {
      p.resolve(msg.result);
    }
  }

  private failPending(err: Error) {
    for (const p of this.pending.values()) {
      clearTimeout(p.timer);
      p.reject(err);
    }
    this.pending.clear();
  }

  rpc(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new UpstreamError(`rpc ${method} before connect`, "network"));
    }
    const id = this.id++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          reject(new UpstreamError(`rpc timeout: ${method}`, "network"));
        }
      }, this.rpcTimeoutMs);
      this.pending.set(id, { resolve, reject, timer });
      ws.send(JSON.stringify({ jsonrpc: "2.0", id, method, params }));
    });
  }

  async getBookSummary(currency: string): Promise<BookSummaryRow[]> {
    const result = await this.rpc("public/get_book_summary_by_currency", { currency, kind: "option" });
    const parsed = z.array(BookSummaryRowSchema).safeParse(result);
    if (!parsed.success) {
      throw new UpstreamError(`malformed book summary for ${currency}`, "malformed");
    }
    return parsed.data;
  }

  close() {
    this.failPending(new UpstreamError("socket closed", "network"));
    if (this.ws) {
      this.ws.removeAllListeners("message");
      this.ws.close();
      this.ws = null;
    }
  }
}
