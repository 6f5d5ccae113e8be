import { DISPLAY_NAME_MAX_LENGTH, GROUP_NAME_MAX_LENGTH } from "../domain/policy.js";
import { ValidationError } from "../errors.js";

function boundedText(raw: string, field: string, max: number): string {
    const value = raw.trim();
    if (value.length === 0) throw new ValidationError(`${field} is required.`);
    if (value.length > max) throw new ValidationError(`${field} must be at most ${max} characters.`);
    return value;
}

export const validateGroupName = (raw: string): string => boundedText(raw, "Group name", GROUP_NAME_MAX_LENGTH);

export const validateDisplayName = (raw: string): string => boundedText(raw, "Display name", DISPLAY_NAME_MAX_LENGTH);
