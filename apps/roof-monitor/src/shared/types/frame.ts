export type Frame = {
  path: string;
  name: string;
  modifiedAt: number;
  size: number;
  load: () => Promise<Buffer>;
};

export const frameKey = (frame: Pick<Frame, "path" | "modifiedAt" | "size">) =>
  `${frame.path}|${frame.modifiedAt}|${frame.size}`;
