import * as ipaddr from "ipaddr.js";
import type { IncomingHttpHeaders } from "node:http";

export function isIpAllowed(ip: string, allowlist: string[]): boolean {
  if (allowlist.length === 0) return false;
  let addr: ipaddr.IPv4 | ipaddr.IPv6;
  try {
    addr = ipaddr.process(ip.trim());
  } catch {
    return false;
  }
  return allowlist.some((entry) => {
    const trimmed = entry.trim();
    try {
      if (trimmed.includes("/")) {
        const cidr = ipaddr.parseCIDR(trimmed);
        return addr.kind() === cidr[0].kind() && addr.match(cidr);
      }
      return addr.toString() === ipaddr.process(trimmed).toString();
    } catch {
      return false;
    }
  });
}

export function normalizeRemoteIp(ip: string | undefined): string {
  const value = ip ?? "";
  if (value.startsWith("::ffff:")) {
    return value.slice(7);
  }
  if (value === "::1") return "127.0.0.1";
  return value;
}

export function getHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value[0];
  return value;
}
