// CHANGE: Editor command envelope for the display parameter
// WHY: The transport serializes commands; the payload is the single DisplayIssue argument
// PURITY: CORE
// INVARIANT: arguments.length = 1
// COMPLEXITY: O(1)

import type { DisplayIssue } from "./types/locations.js";

export const SHOW_ALL_LOCATIONS_COMMAND = "ShowAllLocations";

export interface ShowAllLocationsCommand {
	readonly command: typeof SHOW_ALL_LOCATIONS_COMMAND;
	readonly arguments: readonly [DisplayIssue];
}

export function toShowAllLocationsCommand(
	issue: DisplayIssue,
): ShowAllLocationsCommand {
	return { command: SHOW_ALL_LOCATIONS_COMMAND, arguments: [issue] };
}
