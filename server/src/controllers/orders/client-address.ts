import type { Request } from 'express';

/**
 * Address the request came from. Behind the portal's reverse proxy the socket
 * peer is the proxy itself, so X-Real-IP carries the customer's address.
 */
export function getClientAddress(req: Request, trustRealIpHeader: boolean): string {
  if (trustRealIpHeader) {
    const header = req.headers['x-real-ip'];
    const realIp = Array.isArray(header) ? header[0] : header;
    if (realIp && realIp.trim() !== '') {
      return realIp.trim();
    }
  }
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}
