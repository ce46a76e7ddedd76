import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejections of an async handler to the error middleware.
 */
export function asyncHandler<P, ResBody, ReqBody, ReqQuery>(
  handler: (
    req: Request<P, ResBody, ReqBody, ReqQuery>,
    res: Response<ResBody>,
    next: NextFunction
  ) => Promise<void>
): RequestHandler<P, ResBody, ReqBody, ReqQuery> {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
