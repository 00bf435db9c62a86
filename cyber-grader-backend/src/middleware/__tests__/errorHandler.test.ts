jest.mock("../../utils/logger", () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import express from "express";
import request from "supertest";
import { z } from "zod";
import { logger } from "../../utils/logger";
import {
  CustomError,
  DatabaseError,
  NotFoundError,
  ValidationError,
  asyncHandler,
  errorHandler,
  notFoundHandler,
} from "../errorHandler";
import { ContentValidationError, PersistenceDegradedError, unknownFlag } from "../errors";

const appThrowing = (error: unknown) => {
  const app = express();
  app.use(express.json());
  app.post(
    "/boom",
    asyncHandler(async () => {
      throw error;
    })
  );
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};

describe("Error classes", () => {
  it("creates CustomError with defaults", () => {
    const error = new CustomError("Test error");

    expect(error.message).toBe("Test error");
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe("INTERNAL_SERVER_ERROR");
    expect(error.isOperational).toBe(true);
    expect(error.name).toBe("CustomError");
  });

  it("creates ValidationError with a custom code", () => {
    const error = new ValidationError("Bad input", { field: "x" }, "BAD");

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe("BAD");
    expect(error.details).toEqual({ field: "x" });
  });

  it("creates NotFoundError from a resource name", () => {
    const error = new NotFoundError("Lab L1");

    expect(error.message).toBe("Lab L1 not found");
    expect(error.statusCode).toBe(404);
  });

  it("creates domain errors with their codes", () => {
    expect(unknownFlag("L1", "f9").code).toBe("UNKNOWN_FLAG");
    expect(new DatabaseError().message).toBe("Database operation failed");

    const degraded = new PersistenceDegradedError("postgres", "init", "timeout");
    expect(degraded.message).toBe("postgres init failed: timeout");
    expect(degraded.statusCode).toBe(500);

    const content = new ContentValidationError("labs/01.yml", [{ path: "id", message: "Required" }]);
    expect(content.code).toBe("CONTENT_VALIDATION_ERROR");
    expect(content.details).toEqual({
      file: "labs/01.yml",
      issues: [{ path: "id", message: "Required" }],
    });
    expect(content).toBeInstanceOf(ValidationError);
  });
});

describe("errorHandler", () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    jest.clearAllMocks();
  });

  it("renders operational errors with their status and code", async () => {
    const response = await request(appThrowing(unknownFlag("L1", "f9")))
      .post("/boom")
      .set("x-request-id", "req-1");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: { code: "UNKNOWN_FLAG", message: "Flag f9 in lab L1 not found" },
      timestamp: expect.any(String),
      path: "/boom",
      requestId: "req-1",
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "Client Error",
      expect.objectContaining({ requestId: "req-1", statusCode: 404 })
    );
  });

  it("turns zod errors into validation errors", async () => {
    const parsed = z.object({ user_id: z.string() }).safeParse({});
    const error = parsed.success ? new Error("unreachable") : parsed.error;

    const response = await request(appThrowing(error)).post("/boom");

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid request body",
      details: { user_id: ["Required"] },
    });
  });

  it("reports malformed JSON bodies", async () => {
    const response = await request(appThrowing(new Error("unused")))
      .post("/boom")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({ code: "INVALID_JSON", message: "Malformed JSON body" });
  });

  it("hides internal messages in production", async () => {
    process.env.NODE_ENV = "production";

    const response = await request(appThrowing(new Error("db password leaked"))).post("/boom");

    expect(response.status).toBe(500);
    expect(response.body.error).toEqual({
      code: "INTERNAL_SERVER_ERROR",
      message: "Internal server error",
    });
    expect(logger.error).toHaveBeenCalledWith(
      "Server Error",
      expect.objectContaining({ message: "db password leaked" })
    );
  });
});

describe("notFoundHandler", () => {
  it("answers unknown routes with 404", async () => {
    const response = await request(appThrowing(new Error("unused"))).get("/missing");

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: "NOT_FOUND", message: "Route /missing not found" });
  });
});
