import type { Request, Response } from "express";

/** Aborts when the client goes away before the response has been sent. */
export function requestSignal(_req: Request, res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error("client closed the connection"));
    }
  });
  return controller.signal;
}
