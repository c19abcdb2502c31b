import { resolve } from "path";
import type { ResolvedConfig } from "./config.js";
import { expandHome } from "./config.js";
import { missingDestination, unknownTypeCode } from "./errors/catalog.js";

export interface DestinationChoice {
  /** Directory given on the command line */
  destination?: string;
  /** Short model type code looked up in the config */
  typeCode?: string;
}

/**
 * Pick the destination directory: an explicit directory wins, otherwise the
 * type code is mapped through the configured destinations.
 *
 * @param rawInput - echoed in the error when neither choice is given
 * @throws InvalidInputError
 */
export function selectDestination(
  choice: DestinationChoice,
  config: Pick<ResolvedConfig, "destinations">,
  rawInput = ""
): string {
  if (choice.destination) {
    return resolve(expandHome(choice.destination));
  }

  if (choice.typeCode) {
    const directory = config.destinations[choice.typeCode.toLowerCase()];
    if (!directory) {
      throw unknownTypeCode(choice.typeCode, Object.keys(config.destinations).sort());
    }
    return directory;
  }

  throw missingDestination(rawInput);
}
