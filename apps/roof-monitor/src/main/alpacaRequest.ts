import {
  ALPACA_MAX_BODY_BYTES,
  ALPACA_MAX_TRANSACTION_ID,
} from "../shared/config/alpaca";
import { ProtocolRequestError } from "../shared/errors";
import { isRecord } from "../shared/validation/model";

/**
 * Request parameters as Alpaca reads them: GET query names match without
 * regard to case, PUT form names match exactly.
 */
export class AlpacaParameters {
  private readonly entries: ReadonlyArray<readonly [string, string]>;

  private readonly caseInsensitive: boolean;

  constructor(
    entries: Iterable<readonly [string, string]>,
    caseInsensitive: boolean,
  ) {
    this.entries = [...entries];
    this.caseInsensitive = caseInsensitive;
  }

  get(name: string): string | undefined {
    const wanted = this.caseInsensitive ? name.toLowerCase() : name;
    for (const [key, value] of this.entries) {
      const candidate = this.caseInsensitive ? key.toLowerCase() : key;
      if (candidate === wanted) {
        return value;
      }
    }
    return undefined;
  }
}

export const parseTransactionId = (raw: string | undefined): number => {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return 0;
  }
  const parsed = Number(raw.trim());
  return parsed <= ALPACA_MAX_TRANSACTION_ID ? parsed : 0;
};

export const parseAlpacaBoolean = (
  name: string,
  raw: string | undefined,
): boolean => {
  if (raw === undefined) {
    throw new ProtocolRequestError(400, `Missing ${name} parameter`);
  }
  const normalised = raw.trim().toLowerCase();
  if (normalised === "true") {
    return true;
  }
  if (normalised === "false") {
    return false;
  }
  throw new ProtocolRequestError(
    400,
    `${name} must be True or False, received "${raw}"`,
  );
};

export const readRequestBody = async (
  req: AsyncIterable<unknown>,
  limit = ALPACA_MAX_BODY_BYTES,
): Promise<string> => {
  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    received += buffer.length;
    if (received > limit) {
      throw new ProtocolRequestError(400, "Request body is too large");
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString("utf8");
};

const stringifyParameter = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  return JSON.stringify(value) ?? "";
};

export const parseBodyParameters = (
  body: string,
  contentType: string | undefined,
): AlpacaParameters => {
  if (contentType?.toLowerCase().includes("application/json")) {
    if (body.trim().length === 0) {
      return new AlpacaParameters([], false);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new ProtocolRequestError(400, "Request body is not valid JSON");
    }
    if (!isRecord(parsed)) {
      throw new ProtocolRequestError(400, "Request body must be a JSON object");
    }
    return new AlpacaParameters(
      Object.entries(parsed).map(
        ([key, value]) => [key, stringifyParameter(value)] as const,
      ),
      false,
    );
  }

  return new AlpacaParameters(new URLSearchParams(body), false);
};
