import { describe, expect, it } from "vitest";
import { SheetSyncError, classifyRemoteError, remoteStatusOf } from "../errors.js";

describe("classifyRemoteError", () => {
  it("maps HTTP 429 and quota wording to quota exhaustion", () => {
    const byStatus = classifyRemoteError({ response: { status: 429 }, message: "Too Many Requests" });
    expect(byStatus.code).toBe("RemoteQuotaExceeded");
    expect(byStatus.status).toBe(429);
    expect(classifyRemoteError(new Error("Quota exceeded for quota metric 'Read requests'")).code).toBe(
      "RemoteQuotaExceeded"
    );
  });

  it("prefers quota over permission when a 403 carries rate-limit wording", () => {
    expect(classifyRemoteError({ code: 403, message: "Rate Limit Exceeded" }).code).toBe("RemoteQuotaExceeded");
  });

  it("maps HTTP 403 to permission denied", () => {
    const err = classifyRemoteError({ code: "403", message: "forbidden" });
    expect(err.code).toBe("RemotePermissionDenied");
    expect(err.status).toBe(403);
    expect(err.retryable).toBe(false);
  });

  it("recognizes the cell limit message", () => {
    expect(classifyRemoteError(new Error("above the limit of 10,000,000 cells")).code).toBe("RemoteCapacityExceeded");
  });

  it("keeps anything else verbatim", () => {
    const err = classifyRemoteError(new Error("socket hang up"));
    expect(err).toBeInstanceOf(SheetSyncError);
    expect(err.code).toBe("RemoteUnknownError");
    expect(err.reason).toBe("socket hang up");
    expect(err.message).toBe("RemoteUnknownError: socket hang up");
    expect(classifyRemoteError("plain failure").reason).toBe("plain failure");
  });

  it("passes classified errors through", () => {
    const original = new SheetSyncError("RemoteCapacityExceeded", "full");
    expect(classifyRemoteError(original)).toBe(original);
  });
});

describe("remoteStatusOf", () => {
  it("reads status from the usual places", () => {
    expect(remoteStatusOf({ status: 500 })).toBe(500);
    expect(remoteStatusOf({ code: "ECONNRESET" })).toBeUndefined();
    expect(remoteStatusOf({ response: { status: 404 } })).toBe(404);
    expect(remoteStatusOf(null)).toBeUndefined();
  });
});
