import type { Request } from 'express';
import type { FlashLevel, FlashMessage } from '@magic-chef/shared';

export function addFlash(req: Request, level: FlashLevel, message: string): void {
  req.session.flash = [...(req.session.flash ?? []), { level, message }];
}

/** Messages queued for the next page render; reading clears them. */
export function consumeFlash(req: Request): FlashMessage[] {
  const messages = req.session.flash ?? [];
  delete req.session.flash;
  return messages;
}
