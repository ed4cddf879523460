export const E = {
  UNAUTHORIZED: { detail: "Authentication credentials were not provided." },
  INVALID_TOKEN: { detail: "Invalid token." },
  FORBIDDEN: { detail: "You do not have permission to perform this action." },
  NOT_FOUND: { detail: "Not found." },
  SERVER: { detail: "Internal server error." },
} as const;

export function errorEnvelope<T extends keyof typeof E>(key: T) {
  return { ...E[key] };
}
