import express from "express";
import type { Router } from "express";

export const healthRouter: Router = express.Router();

export function healthHandler(
  _req: unknown,
  res: { type: (value: string) => unknown; send: (body: string) => unknown }
) {
  res.type("text/plain");
  res.send("^_^\n");
}

healthRouter.get("/", healthHandler);
