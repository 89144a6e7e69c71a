import { AzCliMissingError, AzCliNotLoggedInError } from "@skufall/core/lib/azure/az-cli";
import { ConfigurationError, ExhaustionError } from "@skufall/core/lib/fallback/errors";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 64;
export const EXIT_COMMAND_NOT_FOUND = 127;

/** Exit status for errors the CLI expects; null for anything else. */
export function exitCodeForError(err: unknown): number | null {
  if (err instanceof ConfigurationError) return EXIT_USAGE;
  if (err instanceof AzCliMissingError) return EXIT_COMMAND_NOT_FOUND;
  if (err instanceof AzCliNotLoggedInError) return EXIT_FAILURE;
  if (err instanceof ExhaustionError) return EXIT_FAILURE;
  return null;
}
