import { UnauthorizedError } from "../utils/errors";

/**
 * Fails unless the authenticated caller is the owner. A request without an
 * identity never passes.
 */
export const authorizeUser = (
  callerId: string | undefined,
  ownerId: string
): void => {
  if (callerId === undefined || callerId !== ownerId) {
    throw new UnauthorizedError(
      `Authentication failed for user of UUID: \`${ownerId}\`. Operation not permitted.`
    );
  }
};
