// CHANGE: Flow aggregation over the location normalizers
// WHY: A flow is an ordered code path; every source location maps to exactly one Location
// PURITY: CORE
// INVARIANT: |flow.locations| = |source.locations| and order is preserved
// COMPLEXITY: O(n) where n = |locations|

import type { Flow } from "../types/locations.js";
import type { LiveFlow, RemoteFlow, TaintFlow } from "../types/sources.js";
import type { CodeDigest, ReconcileContext } from "./context.js";
import {
	fromLiveLocation,
	fromRemoteLocation,
	fromTaintLocation,
} from "./normalize.js";

export function liveFlow(flow: LiveFlow, digest: CodeDigest): Flow {
	return {
		locations: flow.locations.map((location) =>
			fromLiveLocation(location, digest),
		),
	};
}

/**
 * All locations share the request cache, so a file touched repeatedly along
 * the flow is read once.
 */
export function remoteFlow(flow: RemoteFlow, context: ReconcileContext): Flow {
	return {
		locations: flow.locations.map((location) =>
			fromRemoteLocation(location, context),
		),
	};
}

export function taintFlow(
	flow: TaintFlow,
	workspaceFolderUri: string,
	context: ReconcileContext,
): Flow {
	return {
		locations: flow.locations.map((location) =>
			fromTaintLocation(location, workspaceFolderUri, context),
		),
	};
}
