// src/cli/node-version.ts - no imports: bin.ts runs this before loading the program

export const MIN_NODE_MAJOR = 20;

/** Whether a `process.version` string such as "v20.11.1" meets {@link MIN_NODE_MAJOR}. */
export function meetsNodeRequirement(version: string): boolean {
  const majorVersion = parseInt(version.replace(/^v/, '').split('.')[0], 10);
  return majorVersion >= MIN_NODE_MAJOR;
}
