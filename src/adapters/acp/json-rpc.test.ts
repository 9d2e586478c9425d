import { describe, expect, it } from "vitest";
import { JsonRpcParseError } from "../../errors.js";
import {
  isJsonRpcErrorResponse,
  isJsonRpcNotification,
  isJsonRpcRequest,
  isJsonRpcResponse,
  JsonRpcCodec,
  JsonRpcErrorCode,
} from "./json-rpc.js";

describe("JsonRpcCodec", () => {
  const codec = new JsonRpcCodec();

  describe("createRequest", () => {
    it("creates requests with increasing IDs", () => {
      const r1 = codec.createRequest("session/prompt", { text: "hi" });
      const r2 = codec.createRequest("session/new");

      expect(r1.raw.jsonrpc).toBe("2.0");
      expect(r1.raw.method).toBe("session/prompt");
      expect(r1.raw.params).toEqual({ text: "hi" });

      expect(r2.id).toBe(r1.id + 1);
      expect(r2.raw.method).toBe("session/new");
      expect(r2.raw.params).toBeUndefined();
    });

    it("never reuses an ID across codec instances", () => {
      const a = new JsonRpcCodec().createRequest("initialize");
      const b = new JsonRpcCodec().createRequest("initialize");
      expect(b.id).toBeGreaterThan(a.id);
    });

    it("returns the serialized wire line", () => {
      const { id, line } = codec.createRequest("initialize", { protocolVersion: 1 });
      expect(line).toBe(
        `{"jsonrpc":"2.0","id":${id},"method":"initialize","params":{"protocolVersion":1}}\n`,
      );
    });
  });

  describe("createNotification", () => {
    it("creates notification without id", () => {
      const msg = codec.createNotification("session/cancel");

      expect(msg.jsonrpc).toBe("2.0");
      expect(msg.method).toBe("session/cancel");
      expect("id" in msg).toBe(false);
    });

    it("includes params when provided", () => {
      const msg = codec.createNotification("session/update", { data: 42 });
      expect(msg.params).toEqual({ data: 42 });
    });
  });

  describe("createResponse", () => {
    it("creates success response", () => {
      const msg = codec.createResponse(1, { sessionId: "sess-1" });
      expect(msg).toEqual({ jsonrpc: "2.0", id: 1, result: { sessionId: "sess-1" } });
    });

    it("sends undefined results as null so the line stays a response", () => {
      expect(codec.createResponse("a", undefined).result).toBeNull();
    });
  });

  describe("createErrorResponse", () => {
    it("creates error response", () => {
      const msg = codec.createErrorResponse(1, JsonRpcErrorCode.RESOURCE_NOT_FOUND, "Terminal not found");
      expect(msg).toEqual({
        jsonrpc: "2.0",
        id: 1,
        error: { code: -32001, message: "Terminal not found" },
      });
    });

    it("includes data only when given", () => {
      const msg = codec.createErrorResponse(2, -32603, "boom", { detail: "x" });
      expect(msg.error.data).toEqual({ detail: "x" });
    });
  });

  describe("encode", () => {
    it("encodes message as JSON with trailing newline", () => {
      const encoded = codec.encode(codec.createNotification("session/cancel"));
      expect(encoded).toBe('{"jsonrpc":"2.0","method":"session/cancel"}\n');
    });
  });

  describe("parse", () => {
    it("classifies a request by id + method", () => {
      const result = codec.parse('{"jsonrpc":"2.0","id":7,"method":"fs/read_text_file","params":{"path":"/a"}}');
      expect(result).toEqual({
        ok: true,
        kind: "request",
        message: { jsonrpc: "2.0", id: 7, method: "fs/read_text_file", params: { path: "/a" } },
      });
    });

    it("classifies a response by id + result", () => {
      const result = codec.parse('{"jsonrpc":"2.0","id":1,"result":{"protocolVersion":1}}');
      expect(result.ok && result.kind).toBe("response");
    });

    it("classifies a null result as a response", () => {
      const result = codec.parse('{"jsonrpc":"2.0","id":"x","result":null}');
      expect(result).toEqual({
        ok: true,
        kind: "response",
        message: { jsonrpc: "2.0", id: "x", result: null },
      });
    });

    it("classifies an error by id + error", () => {
      const result = codec.parse(
        '{"jsonrpc":"2.0","id":3,"error":{"code":-32601,"message":"Method not found","data":"x"}}',
      );
      expect(result).toEqual({
        ok: true,
        kind: "error",
        message: {
          jsonrpc: "2.0",
          id: 3,
          error: { code: -32601, message: "Method not found", data: "x" },
        },
      });
    });

    it("fills a malformed error object with internal-error defaults", () => {
      const result = codec.parse('{"jsonrpc":"2.0","id":3,"error":"nope"}');
      expect(result.ok && result.kind === "error" && result.message.error).toEqual({
        code: -32603,
        message: "Unknown error",
      });
    });

    it("classifies a notification by method without id", () => {
      const result = codec.parse('{"jsonrpc":"2.0","method":"session/update","params":{"sessionUpdate":"plan"}}');
      expect(result.ok && result.kind).toBe("notification");
    });

    it("trims whitespace before parsing", () => {
      const result = codec.parse('  {"jsonrpc":"2.0","id":1,"result":{}}  \n');
      expect(result.ok).toBe(true);
    });

    it.each([
      ["", "empty"],
      ["   ", "empty"],
      ["not json", "invalid_json"],
      ["[1,2]", "unclassifiable"],
      ['{"jsonrpc":"1.0","id":1,"result":{}}', "invalid_version"],
      ['{"id":1,"result":{}}', "invalid_version"],
      ['{"jsonrpc":"2.0","id":1}', "unclassifiable"],
      ['{"jsonrpc":"2.0","id":{"x":1},"method":"m"}', "unclassifiable"],
      ['{"jsonrpc":"2.0"}', "unclassifiable"],
    ])("returns a typed failure for %j", (line, reason) => {
      const result = codec.parse(line);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(JsonRpcParseError);
        expect(result.error.reason).toBe(reason);
      }
    });
  });

  describe("decode", () => {
    it("returns the message for valid input", () => {
      const msg = codec.decode('{"jsonrpc":"2.0","id":1,"method":"initialize","params":{}}');
      expect(isJsonRpcRequest(msg)).toBe(true);
    });

    it("throws JsonRpcParseError on invalid input", () => {
      expect(() => codec.decode("")).toThrow("Empty JSON-RPC message");
      expect(() => codec.decode('{"jsonrpc":"1.0","id":1}')).toThrow("Invalid JSON-RPC version");
      expect(() => codec.decode("not json")).toThrow(JsonRpcParseError);
    });
  });

  describe("type guards", () => {
    it("tell the four shapes apart", () => {
      const request = codec.createRequest("m").raw;
      const response = codec.createResponse(1, {});
      const error = codec.createErrorResponse(1, -32603, "x");
      const notification = codec.createNotification("m");

      expect(isJsonRpcRequest(request)).toBe(true);
      expect(isJsonRpcResponse(response)).toBe(true);
      expect(isJsonRpcErrorResponse(response)).toBe(false);
      expect(isJsonRpcErrorResponse(error)).toBe(true);
      expect(isJsonRpcNotification(notification)).toBe(true);
      expect(isJsonRpcNotification(request)).toBe(false);
    });
  });

  describe("roundtrip encode/decode", () => {
    it("request survives roundtrip", () => {
      const { raw, line } = codec.createRequest("session/prompt", {
        prompt: [{ type: "text", text: "hi" }],
      });
      const decoded = codec.decode(line);

      expect(decoded).toEqual(raw);
    });
  });
});
