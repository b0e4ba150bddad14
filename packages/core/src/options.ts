export type DisplayOptions = Readonly<{
  milliseconds: boolean;
  utc: boolean;
  iso: boolean;
}>;

export type DisplayFlags = {
  milis?: boolean;
  utc?: boolean;
  iso?: boolean;
};

export function makeDisplayOptions(flags: DisplayFlags = {}): DisplayOptions {
  return Object.freeze({
    milliseconds: flags.milis ?? false,
    utc: flags.utc ?? false,
    iso: flags.iso ?? false,
  });
}
