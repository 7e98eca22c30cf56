import { httpStatusFor } from "./processRfp";

describe("httpStatusFor", () => {
  it("maps pipeline codes to HTTP statuses", () => {
    expect(httpStatusFor("NOT_FOUND")).toBe(404);
    expect(httpStatusFor("VALIDATION_ERROR")).toBe(400);
    expect(httpStatusFor("UPSTREAM_UNAVAILABLE")).toBe(503);
    expect(httpStatusFor("CANCELLED")).toBe(499);
    expect(httpStatusFor("INTERNAL_ERROR")).toBe(500);
  });
});
