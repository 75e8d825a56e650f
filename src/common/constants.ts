export const ENUM_OWNER_MODES = {
  SHARED: 'shared',
  DEDICATED: 'dedicated',
} as const;
export type OwnerModeColumn = typeof ENUM_OWNER_MODES[keyof typeof ENUM_OWNER_MODES];

export const ENUM_BROADCAST_TARGETS = {
  OWNERS: 'owners',
  USERS: 'users',
  DEDICATED_USERS: 'dedicated_users',
  ALL: 'all',
} as const;
export type BroadcastTarget = typeof ENUM_BROADCAST_TARGETS[keyof typeof ENUM_BROADCAST_TARGETS];

export const OWNER_CATEGORIES = ['Tech', 'Education', 'E-commerce', 'Other'] as const;

export const BUSINESS_NAME_MIN_LENGTH = 2;
export const BUSINESS_NAME_MAX_LENGTH = 100;
export const BIO_MAX_LENGTH = 500;

export const DAY_MS = 24 * 60 * 60 * 1000;

export const FRONT_DOOR_DEEP_LINK_PREFIX = 'owner_';
