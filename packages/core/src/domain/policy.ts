// Product policy. These are fixed limits, not configuration.
export const MAX_GROUP_MEMBERS = 3;
export const TRIAL_LENGTH_DAYS = 14;
export const COOLDOWN_DAYS = 30;
export const ADMIN_TENURE_DAYS = 30;
export const MAX_LIFETIME_TRANSITIONS = 3;

export const GROUP_NAME_MAX_LENGTH = 50;
export const DISPLAY_NAME_MAX_LENGTH = 50;

export const INVITE_CODE_LENGTH = 6;
export const INVITE_CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const INVITE_CODE_MAX_ATTEMPTS = 10;

export const DEFAULT_TRANSACTION_ATTEMPTS = 5;
