import {
  NetworkError,
  RemoteNotFoundError,
  RemoteRateLimitedError,
  RemoteServerError,
  TransportError,
} from "../application/errors";
import { getNumber, getString, isRecord } from "../application/guards";

/** Status HTTP de um erro do Gaxios (`response.status`) ou do webdav (`status`). */
export function statusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const direct = getNumber(err["status"]);
  if (direct !== undefined) return direct;
  const res = err["response"];
  return isRecord(res) ? getNumber(res["status"]) : undefined;
}

export function retryAfterOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const res = err["response"];
  if (!isRecord(res)) return undefined;
  const headers = res["headers"];
  if (!isRecord(headers)) return undefined;
  const raw = getString(headers["retry-after"]);
  const seconds = raw === undefined ? NaN : Number(raw);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Mapeamento comum de status para a taxonomia de transporte.
 * `service` só aparece na mensagem dos status sem categoria própria.
 */
export function httpTransportError(err: unknown, service: string): TransportError {
  if (err instanceof TransportError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);

  if (status === undefined) return new NetworkError(message, err);
  if (status === 404) return new RemoteNotFoundError(message, err);
  if (status === 429) return new RemoteRateLimitedError(message, retryAfterOf(err), err);
  if (status >= 500) return new RemoteServerError(message, status, err);
  return new TransportError(`${service} request failed (${status}): ${message}`, err);
}
