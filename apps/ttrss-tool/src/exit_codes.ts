import {
  AmbiguousPathError,
  ApiError,
  AuthError,
  NotFoundError,
  ProtocolError,
  TransportError,
} from "ttrss-sdk-js";

import { ConfigError } from "./config";

// sysexits(3)
export const EX_SUCCESS = 0;
export const EX_USAGE = 64;
export const EX_DATAERR = 65;
export const EX_NOINPUT = 66;
export const EX_UNAVAILABLE = 69;
export const EX_SOFTWARE = 70;
export const EX_PROTOCOL = 76;
export const EX_NOPERM = 77;
export const EX_CONFIG = 78;

export function exitCodeFor(error: unknown): number {
  if (error instanceof AmbiguousPathError) return EX_USAGE;
  if (error instanceof NotFoundError) return EX_NOINPUT;
  if (error instanceof ApiError) return EX_DATAERR;
  if (error instanceof TransportError) return EX_UNAVAILABLE;
  if (error instanceof ProtocolError) return EX_PROTOCOL;
  if (error instanceof AuthError) return EX_NOPERM;
  if (error instanceof ConfigError) return EX_CONFIG;
  return EX_SOFTWARE;
}
