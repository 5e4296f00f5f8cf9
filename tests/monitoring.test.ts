import * as core from "@actions/core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { StabilityTimeoutError } from "../src/errors.js";
import {
  isServiceStable,
  lastDeploymentTime,
  parseTimestamp,
  waitForServiceStability,
  type ServiceStatus,
} from "../src/monitoring.js";
import type { EcsDeploymentInfo } from "../src/types.js";

vi.mock("@actions/core");

function deployment(
  id: string,
  overrides: Partial<EcsDeploymentInfo> = {},
): EcsDeploymentInfo {
  return {
    id,
    status: "PRIMARY",
    desiredCount: 2,
    runningCount: 2,
    createdAt: "2024-05-01T10:00:00.000Z",
    updatedAt: "2024-05-01T10:05:00.000Z",
    rolloutState: "IN_PROGRESS",
    ...overrides,
  };
}

function service(
  deployments: EcsDeploymentInfo[],
  runningCount = 2,
): ServiceStatus {
  return { serviceName: "api", desiredCount: 2, runningCount, deployments };
}

describe("Monitoring", () => {
  beforeEach(() => {
    vi.useRealTimers();
    vi.resetAllMocks();
  });

  describe("isServiceStable", () => {
    it("should be stable with a single deployment running all tasks", () => {
      expect(isServiceStable(service([deployment("ecs-svc/1")]))).toBe(true);
    });

    it("should not be stable while tasks are missing", () => {
      expect(isServiceStable(service([deployment("ecs-svc/1")], 1))).toBe(
        false,
      );
    });

    it("should not be stable while an old deployment is draining", () => {
      expect(
        isServiceStable(
          service([
            deployment("ecs-svc/2"),
            deployment("ecs-svc/1", { status: "ACTIVE" }),
          ]),
        ),
      ).toBe(false);
    });

    it("should fail on failed rollouts", () => {
      expect(() =>
        isServiceStable(
          service([
            deployment("ecs-svc/2", {
              rolloutState: "FAILED",
              rolloutStateReason: "tasks failed to start",
            }),
          ]),
        ),
      ).toThrowError(
        'Deployment ecs-svc/2 of service "api" failed: tasks failed to start',
      );
    });
  });

  describe("waitForServiceStability", () => {
    it("should poll until the service is stable", async () => {
      vi.useFakeTimers();

      const describeService = vi
        .fn<() => Promise<ServiceStatus>>()
        .mockResolvedValueOnce(
          service([deployment("ecs-svc/2"), deployment("ecs-svc/1")]),
        )
        .mockResolvedValueOnce(service([deployment("ecs-svc/2")], 1))
        .mockResolvedValueOnce(service([deployment("ecs-svc/2")]));

      const promise = waitForServiceStability(describeService, {
        interval: 15,
        timeout: 600,
      });
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toEqual(service([deployment("ecs-svc/2")]));
      expect(describeService).toHaveBeenCalledTimes(3);
      expect(core.info).toHaveBeenCalledWith('Service "api" is stable');
    });

    it("should wait for the interval between two checks", async () => {
      vi.useFakeTimers();

      const describeService = vi
        .fn<() => Promise<ServiceStatus>>()
        .mockResolvedValueOnce(service([deployment("ecs-svc/2")], 1))
        .mockResolvedValueOnce(service([deployment("ecs-svc/2")]));

      const promise = waitForServiceStability(describeService, {
        interval: 15,
        timeout: 600,
      });

      await vi.advanceTimersByTimeAsync(14_999);
      expect(describeService).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(promise).resolves.toBeDefined();
      expect(describeService).toHaveBeenCalledTimes(2);
    });

    it("should give up once the attempts afforded by the timeout are used", async () => {
      vi.useFakeTimers();

      const describeService = vi
        .fn<() => Promise<ServiceStatus>>()
        .mockResolvedValue(service([deployment("ecs-svc/2")], 0));

      const promise = waitForServiceStability(describeService, {
        interval: 15,
        timeout: 40,
      });
      const expectation = expect(promise).rejects.toThrowError(
        new StabilityTimeoutError(3),
      );
      await vi.runAllTimersAsync();
      await expectation;

      expect(describeService).toHaveBeenCalledTimes(3);
    });

    it("should stop polling when aborted", async () => {
      vi.useFakeTimers();

      const controller = new AbortController();
      const reason = new Error("Deployment was cancelled");
      const describeService = vi
        .fn<() => Promise<ServiceStatus>>()
        .mockResolvedValue(service([deployment("ecs-svc/2")], 0));

      const promise = waitForServiceStability(describeService, {
        interval: 15,
        timeout: 600,
        signal: controller.signal,
      });
      const expectation = expect(promise).rejects.toBe(reason);

      await vi.advanceTimersByTimeAsync(1_000);
      controller.abort(reason);
      await expectation;

      expect(describeService).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("should not report success if aborted while describing the service", async () => {
      const controller = new AbortController();
      const reason = new Error("Deployment was cancelled");
      const describeService = vi
        .fn<() => Promise<ServiceStatus>>()
        .mockImplementation(async () => {
          controller.abort(reason);

          return service([deployment("ecs-svc/1")]);
        });

      await expect(
        waitForServiceStability(describeService, {
          interval: 15,
          timeout: 600,
          signal: controller.signal,
        }),
      ).rejects.toBe(reason);
      expect(core.info).not.toHaveBeenCalled();
    });

    it("should propagate failures to describe the service", async () => {
      const describeService = vi
        .fn<() => Promise<ServiceStatus>>()
        .mockRejectedValue(new Error("AccessDenied"));

      await expect(
        waitForServiceStability(describeService, { interval: 15, timeout: 600 }),
      ).rejects.toThrowError("AccessDenied");
    });
  });

  describe("parseTimestamp", () => {
    it("should parse ISO 8601 timestamps", () => {
      expect(parseTimestamp("2024-05-01T10:05:00.000Z").toISOString()).toBe(
        "2024-05-01T10:05:00.000Z",
      );
    });

    it("should parse epoch seconds", () => {
      expect(parseTimestamp(1714557900.5).toISOString()).toBe(
        "2024-05-01T10:05:00.500Z",
      );
    });

    it("should reject invalid timestamps", () => {
      expect(() => parseTimestamp("yesterday")).toThrowError(
        "Invalid timestamp: yesterday",
      );
    });
  });

  describe("lastDeploymentTime", () => {
    it("should return the most recent update of any deployment", () => {
      expect(
        lastDeploymentTime(
          service([
            deployment("ecs-svc/2", { updatedAt: "2024-05-01T10:05:00.000Z" }),
            deployment("ecs-svc/1", { updatedAt: "2024-05-02T08:00:00.000Z" }),
          ]),
        ).toISOString(),
      ).toBe("2024-05-02T08:00:00.000Z");
    });

    it("should return the epoch for services without deployments", () => {
      expect(lastDeploymentTime(service([])).getTime()).toBe(0);
    });
  });
});
