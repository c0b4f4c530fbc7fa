import { resolveNode } from "./administration";
import { hasLink, link, LinkKey } from "./link-registry";
import { issueToken } from "./token";
import { adopt } from "./wrap";

/**
 * Read-side half of tracking, applied whenever a field or element is read:
 * - a raw composite (never wrapped, or put there behind the tracker's back) is wrapped now;
 *   the caller stores the result back in place of the raw value
 * - a tracked node that lost its link to this owner is linked again
 * - anything else comes back untouched
 *
 * This is what lets lazy fields pay for wrapping on first touch instead of on construction.
 */
export const materialize = (owner: object, key: LinkKey, stored: unknown): unknown => {
  if (typeof stored !== "object" || stored === null) {
    return stored;
  }
  const token = issueToken(owner);
  const node = resolveNode(stored);
  if (node) {
    if (!hasLink(node, token, key)) {
      link(node, token, key);
    }
    return node;
  }
  return adopt(stored, token, key);
};
