// src/routes/asyncHandler.ts

import { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejections from an async route to the error middleware
 * (Express 4 does not await handlers)
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}
