import type { FastifyRequest } from "fastify";

export interface ClientMeta {
  ipAddress: string | null;
  userAgent: string | null;
}

export function getClientIp(request: FastifyRequest): string | null {
  const ip = request.ip;
  return typeof ip === "string" && ip.length > 0 ? ip : null;
}

export function getUserAgent(request: FastifyRequest): string | null {
  const ua = request.headers["user-agent"];
  // Cap what ends up in the sessions table.
  return typeof ua === "string" ? ua.slice(0, 512) : null;
}

export function getClientMeta(request: FastifyRequest): ClientMeta {
  return { ipAddress: getClientIp(request), userAgent: getUserAgent(request) };
}
