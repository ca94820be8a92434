/**
 * Session and environment snapshots.
 *
 * @module session
 */

export {
	createDebugSession,
	createModsInformation,
	createSessionInformation,
	type DebugSession,
	describeOperatingSystem,
	formatDirectoryOutline,
	MODS_INFORMATION_FAILURE,
	type OperatingSystemDescription,
	SESSION_INFORMATION_FAILURE,
	type SessionInformationInit,
} from "./session.js";
