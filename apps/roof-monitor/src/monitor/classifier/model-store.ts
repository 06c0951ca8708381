import { readFile, writeFile } from "node:fs/promises";
import { describeRoofModelIssues, isRoofModel } from "../../shared/validation/model";
import type { RoofModel } from "../../shared/types/model";

export class ModelFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`Model file ${path}: ${message}`, options);
    this.name = "ModelFileError";
    this.path = path;
  }
}

export const parseRoofModel = (path: string, contents: string): RoofModel => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new ModelFileError(path, "not valid JSON", { cause: error });
  }

  if (!isRoofModel(parsed)) {
    throw new ModelFileError(path, describeRoofModelIssues(parsed).join("; "));
  }
  return parsed;
};

export const loadModelFile = async (path: string): Promise<RoofModel> => {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    throw new ModelFileError(path, "could not be read", { cause: error });
  }
  return parseRoofModel(path, contents);
};

export const saveModelFile = async (
  path: string,
  model: RoofModel,
): Promise<void> => {
  const issues = describeRoofModelIssues(model);
  if (issues.length > 0) {
    throw new ModelFileError(path, issues.join("; "));
  }
  await writeFile(path, `${JSON.stringify(model, null, 2)}\n`, "utf8");
};
