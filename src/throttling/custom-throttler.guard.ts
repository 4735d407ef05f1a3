import { Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';

function firstString(value: unknown): string {
  if (Array.isArray(value)) return firstString(value[0]);
  return typeof value === 'string' ? value : '';
}

/** Keys rate limits on the caller's IP; there are no user accounts. */
@Injectable()
export class CustomThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    return `ip:${resolveClientIp(req)}`;
  }
}

export function resolveClientIp(req: Record<string, unknown>): string {
  const headers: object =
    typeof req.headers === 'object' && req.headers !== null ? req.headers : {};
  const forwarded =
    'x-forwarded-for' in headers
      ? firstString(headers['x-forwarded-for']).split(',')[0].trim()
      : '';

  const socket: object =
    typeof req.socket === 'object' && req.socket !== null ? req.socket : {};
  const remote =
    'remoteAddress' in socket ? firstString(socket.remoteAddress).trim() : '';

  return firstString(req.ip).trim() || forwarded || remote || 'unknown-ip';
}
