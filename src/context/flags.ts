export type RuntimeFlags = {
  approve: boolean;
  nonInteractive: boolean;
  verbose: boolean;
};

const flags: RuntimeFlags = {
  approve: false,
  nonInteractive: false,
  verbose: process.env.RELEASE_PREP_VERBOSE === "1"
};

export function setFlags(next: Partial<RuntimeFlags>): void {
  if ("approve" in next) {
    flags.approve = Boolean(next.approve);
  }
  if ("nonInteractive" in next) {
    flags.nonInteractive = Boolean(next.nonInteractive);
  }
  if ("verbose" in next) {
    flags.verbose = Boolean(next.verbose);
  }
}

export function getFlags(): RuntimeFlags {
  return { ...flags };
}
