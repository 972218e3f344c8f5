import { createParamDecorator, ExecutionContext } from '@nestjs/common';

export const ACTOR_HEADER = 'x-actor-id';

type HeaderBag = Record<string, string | string[] | undefined>;

export function actorFromHeaders(headers: HeaderBag): string | undefined {
  const raw = headers[ACTOR_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  // audit rows keep at most 36 characters of it
  return value?.trim().slice(0, 36) || undefined;
}

/** Id of the back-office user performing the request, if the caller sent one. */
export const Actor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string | undefined =>
    actorFromHeaders(ctx.switchToHttp().getRequest<{ headers: HeaderBag }>().headers),
);
