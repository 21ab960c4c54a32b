import { Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function field(source: unknown, key: string): unknown {
  return source && typeof source === 'object' && key in source
    ? Reflect.get(source, key)
    : undefined;
}

/** Rate limits per client IP, honouring the first hop of `x-forwarded-for`. */
export function clientIp(req: Record<string, unknown>): string {
  const forwarded = text(field(req.headers, 'x-forwarded-for')).split(',')[0]?.trim();

  return (
    text(req.ip) ||
    forwarded ||
    text(field(req.socket, 'remoteAddress')) ||
    'unknown-ip'
  );
}

@Injectable()
export class CustomThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    return `ip:${clientIp(req)}`;
  }
}
