/**
 * Input validation utilities.
 *
 * @module validation
 */

export {
	isSafeFilename,
	shortHash,
	toSafeFilename,
	toUniqueSafeFilename,
} from "./filenames.js";
