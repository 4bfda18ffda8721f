import { getNamespace } from "./env";

const slugify = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 32);

/**
 * Deterministic ids for one suite. Every id embeds the suite slug and the
 * namespace, so records from different suites never collide and a failing
 * assertion shows where an id came from.
 */
export type FakeFactory = {
  namespace: string;
  suite: string;
  nextId: (prefix: string) => string;
  /** Platform user id; also short enough to serve as a display name. */
  userId: () => string;
};

export const createFakeFactory = (suiteName: string): FakeFactory => {
  const namespace = getNamespace();
  const suite = slugify(suiteName) || "suite";
  let counter = 0;

  const nextId = (prefix: string): string => {
    counter += 1;
    return `${prefix}-${suite}-${namespace}-${counter}`;
  };

  return {
    namespace,
    suite,
    nextId,
    userId: () => nextId("user"),
  };
};
