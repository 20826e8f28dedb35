import type { Request, Response } from "express";
import { SHARED_SECRET_HEADER, verifySharedSecret } from "./shared-secret";

function run(headerValue?: string) {
  const res = {
    statusCode: 200,
    body: undefined as unknown,
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockImplementation((code: number) => {
    res.statusCode = code;
    return res;
  });
  res.json.mockImplementation((body: unknown) => {
    res.body = body;
    return res;
  });
  const header = jest.fn((name: string) =>
    name === SHARED_SECRET_HEADER ? headerValue : undefined,
  );
  const next = jest.fn();

  verifySharedSecret(
    { header } as unknown as Request,
    res as unknown as Response,
    next,
  );
  return { res, next };
}

describe("verifySharedSecret", () => {
  afterEach(() => {
    delete process.env.PROXY_SHARED_SECRET;
  });

  it("lets everything through when no secret is configured", () => {
    const { res, next } = run();
    expect(next).toHaveBeenCalledTimes(1);
    expect(res.status).not.toHaveBeenCalled();
  });

  it("rejects a missing or wrong secret", () => {
    process.env.PROXY_SHARED_SECRET = "test-secret";

    for (const value of [undefined, "wrong-secret"]) {
      const { res, next } = run(value);
      expect(next).not.toHaveBeenCalled();
      expect(res.statusCode).toBe(403);
      expect(res.body).toEqual({
        error: "Forbidden: invalid or missing shared secret",
      });
    }
  });

  it("accepts the configured secret", () => {
    process.env.PROXY_SHARED_SECRET = "test-secret";

    const { next } = run("test-secret");
    expect(next).toHaveBeenCalledTimes(1);
  });
});
