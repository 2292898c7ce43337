import rateLimit from "express-rate-limit";
import type { ApiErrorResponse } from "@graphqa/shared";
import { appConfig } from "../config.js";

const tooManyRequests: ApiErrorResponse = { error: "Too many requests, please try again later" };

export const apiRateLimiter = rateLimit({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  max: appConfig.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  message: tooManyRequests
});

// Each ingested document triggers one extraction call.
export const ingestRateLimiter = rateLimit({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  max: appConfig.INGEST_RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  message: tooManyRequests
});
