/**
 * Task parameters as they arrive from a pipeline, and their conversion to the
 * strictly JSON-serializable mapping the injector takes.
 *
 * Two keys are reserved: `product` (an artifact) and `upstream` (a record of
 * artifacts). Artifacts convert themselves through `toJsonSerializable()`;
 * every other value must already be JSON-serializable and is passed through
 * unchecked.
 */
import type { JsonValue } from "./model.ts";

export interface JsonSerializable {
  toJsonSerializable(): JsonValue;
}

export interface ParamsLike {
  toDict(): Record<string, unknown>;
}

export type TaskParams = Record<string, unknown> | ParamsLike;

export type SerializedParams = Record<string, unknown>;

export function isJsonSerializable(value: unknown): value is JsonSerializable {
  return !!value && typeof value === "object" &&
    "toJsonSerializable" in value &&
    typeof value.toJsonSerializable === "function";
}

function isParamsLike(value: TaskParams): value is ParamsLike {
  return "toDict" in value && typeof value.toDict === "function";
}

export function paramsToRecord(params: TaskParams): Record<string, unknown> {
  return isParamsLike(params) ? params.toDict() : { ...params };
}

function serializeArtifact(value: unknown): unknown {
  return isJsonSerializable(value) ? value.toJsonSerializable() : value;
}

export function jsonSerializableParams(params: TaskParams): SerializedParams {
  const out = paramsToRecord(params);

  if ("product" in out) out.product = serializeArtifact(out.product);

  const upstream = out.upstream;
  if (upstream && typeof upstream === "object" && !Array.isArray(upstream)) {
    out.upstream = Object.fromEntries(
      Object.entries(upstream).map(([k, v]) => [k, serializeArtifact(v)]),
    );
  }
  return out;
}
