import * as core from "@actions/core";
import { exec, type ExecOptions } from "@actions/exec";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { run } from "../src/main.js";

const readFile = vi.hoisted(() => vi.fn());
const writeFile = vi.hoisted(() => vi.fn());
const unlink = vi.hoisted(() => vi.fn());
vi.mock("node:fs/promises", () => ({ readFile, writeFile, unlink }));

const mockUploadArtifact = vi.hoisted(() => vi.fn());
vi.mock("@actions/artifact", () => ({
  DefaultArtifactClient: vi.fn(() => ({
    uploadArtifact: mockUploadArtifact,
  })),
}));

const mockRandomUUID = vi.hoisted(() => vi.fn());
vi.mock("node:crypto", async (importOriginal) => ({
  ...(await importOriginal<typeof import("node:crypto")>()),
  randomUUID: mockRandomUUID,
}));
vi.mock("@actions/core");
vi.mock("@actions/exec");

/**
 * Output of a failed AWS CLI invocation.
 */
class CliFailure {
  constructor(readonly stderr: string) {}
}

type CliHandler = (args: string[]) => unknown;

function mockAws(handlers: Record<string, CliHandler>) {
  vi.mocked(exec).mockImplementation(
    async (_0: string, args: string[] = [], options?: ExecOptions) => {
      const handler = handlers[`${args[0]} ${args[1]}`];

      if (!handler) {
        throw new Error(`Unexpected command: aws ${args.join(" ")}`);
      }

      const response = handler(args);

      if (response instanceof CliFailure) {
        options?.listeners?.stderr?.(Buffer.from(response.stderr));

        throw new Error("The process '/usr/bin/aws' failed with exit code 255");
      }

      options?.listeners?.stdout?.(
        Buffer.from(
          typeof response === "string" ? response : JSON.stringify(response),
        ),
      );

      return 0;
    },
  );
}

function mockInputs(inputs: Record<string, string>) {
  vi.mocked(core.getInput).mockImplementation((name) => inputs[name] ?? "");
}

function environmentStack(outputs: Record<string, string>) {
  return {
    Stacks: [
      {
        StackName: "shop-test",
        StackStatus: "UPDATE_COMPLETE",
        Outputs: Object.entries(outputs).map(([OutputKey, OutputValue]) => ({
          OutputKey,
          OutputValue,
        })),
      },
    ],
  };
}

const files: Record<string, string> = {
  "/workspace/manifest.yml": [
    "name: api",
    "type: Load Balanced Web Service",
    "image:",
    "  port: 8080",
    "http:",
    "  path: api",
  ].join("\n"),
  "/workspace/environment.yml":
    "name: test\napplication: shop\nregion: us-west-2\n",
  "/workspace/application.yml": "name: shop\n",
  "/workspace/stack.template.yml": "Description: ${STACK_NAME}\n",
};

describe("main", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.unstubAllEnvs();
    vi.stubEnv("GITHUB_WORKSPACE", "/workspace");

    readFile.mockImplementation(async (path: string) => {
      if (path in files) {
        return files[path];
      }

      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    });
    writeFile.mockResolvedValue(undefined);
    unlink.mockResolvedValue(undefined);
    mockRandomUUID.mockReturnValue("c0ffee");
    mockInputs({ "artifact-bucket": "artifacts" });
  });

  it("should deploy a workload", async () => {
    mockAws({
      "cloudformation describe-stacks": () =>
        environmentStack({
          ServiceDiscoveryEndpoint: "test.shop.local",
          PublicLoadBalancerDNSName: "lb.example.com",
        }),
      "cloudformation deploy": () => "Successfully created/updated stack",
    });
    mockUploadArtifact.mockResolvedValueOnce({ id: 42 });

    await expect(run()).resolves.toBeUndefined();

    expect(core.setFailed).not.toHaveBeenCalled();
    expect(core.setOutput).toHaveBeenCalledWith("stack-name", "shop-test-api");
    expect(core.setOutput).toHaveBeenCalledWith("outcome", "applied");
    expect(core.setOutput).toHaveBeenCalledWith("status", "success");
    expect(core.setOutput).toHaveBeenCalledWith(
      "service-url",
      "http://lb.example.com/api",
    );
    expect(writeFile).toHaveBeenCalledWith(
      expect.stringMatching(/shop-test-api\.c0ffee\.yml$/),
      "Description: shop-test-api\n",
      "utf8",
    );
  });

  it("should store the stack configuration as an artifact", async () => {
    mockAws({
      "cloudformation describe-stacks": () =>
        environmentStack({ ServiceDiscoveryEndpoint: "test.shop.local" }),
      "cloudformation deploy": () => "",
    });
    mockUploadArtifact.mockResolvedValueOnce({ id: 42 });

    await run();

    const path = "./stack-configuration.generated.c0ffee.json";
    const [, content] =
      writeFile.mock.calls.find(([file]) => file === path) ?? [];

    expect(JSON.parse(String(content))).toMatchObject({
      kind: "Load Balanced Web Service",
      stackName: "shop-test-api",
      serviceDiscovery: {
        endpoint: "test.shop.local",
        record: "api.shop.local:8080",
      },
    });
    expect(mockUploadArtifact).toHaveBeenCalledWith(
      "stack-configuration",
      [path],
      ".",
      { retentionDays: 30 },
    );
  });

  it("should only warn if the artifact cannot be stored", async () => {
    mockAws({
      "cloudformation describe-stacks": () =>
        environmentStack({ ServiceDiscoveryEndpoint: "test.shop.local" }),
      "cloudformation deploy": () => "",
    });
    mockUploadArtifact.mockRejectedValueOnce(new Error("quota exceeded"));

    await run();

    expect(core.setFailed).not.toHaveBeenCalled();
    expect(core.setOutput).toHaveBeenCalledWith("status", "success");
    expect(core.warning).toHaveBeenCalledWith(
      expect.objectContaining({
        message:
          "Failed to store stack configuration artifact: Failed to upload " +
          "stack configuration artifact: quota exceeded",
      }),
    );
  });

  it("should report a deployment failure", async () => {
    mockAws({
      "cloudformation describe-stacks": () =>
        environmentStack({ ServiceDiscoveryEndpoint: "test.shop.local" }),
      "cloudformation deploy": () =>
        new CliFailure("An error occurred (AccessDenied)"),
    });

    await expect(run()).resolves.toBeUndefined();

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.objectContaining({
        message:
          "deploy failed: Failed to execute AWS CLI command: The process " +
          "'/usr/bin/aws' failed with exit code 255",
      }),
    );
    expect(core.setOutput).toHaveBeenCalledExactlyOnceWith("status", "failure");
    expect(mockUploadArtifact).not.toHaveBeenCalled();
  });

  it("should report stability timeouts distinctly", async () => {
    const service = {
      serviceName: "api",
      desiredCount: 1,
      runningCount: 0,
      deployments: [
        {
          id: "ecs-svc/1",
          status: "PRIMARY",
          desiredCount: 1,
          runningCount: 0,
          createdAt: "2020-01-01T00:00:00.000Z",
          updatedAt: "2020-01-01T00:00:00.000Z",
        },
      ],
    };
    mockInputs({
      "artifact-bucket": "artifacts",
      "stability-interval": "15",
      "stability-timeout": "15",
    });
    vi.mocked(core.getBooleanInput).mockImplementation(
      (name) => name === "force-new-update",
    );
    mockAws({
      "cloudformation describe-stacks": () =>
        environmentStack({
          ServiceDiscoveryEndpoint: "test.shop.local",
          ClusterId: "shop-test-Cluster",
        }),
      "cloudformation deploy": () =>
        new CliFailure("\nNo changes to deploy. Stack shop-test-api is up to date\n"),
      "cloudformation describe-stack-resource": () => ({
        StackResourceDetail: {
          LogicalResourceId: "Service",
          PhysicalResourceId: "arn:aws:ecs:us-west-2:123456789012:service/api",
          ResourceType: "AWS::ECS::Service",
          ResourceStatus: "UPDATE_COMPLETE",
        },
      }),
      "ecs describe-services": () => ({ services: [service] }),
      "ecs update-service": () => ({ service }),
    });

    await run();

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.objectContaining({
        name: "ForceUpdateTimeoutError",
        message: "force an update for service api: max retries 1 exceeded",
      }),
    );
    expect(core.setOutput).toHaveBeenCalledExactlyOnceWith("status", "timeout");
    expect(exec).toHaveBeenCalledWith(
      "aws",
      expect.arrayContaining(["ecs", "update-service", "--force-new-deployment"]),
      expect.any(Object),
    );
  });

  it("should reject environment files for another environment", async () => {
    mockInputs({ "artifact-bucket": "artifacts", environment: "prod" });

    await run();

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.objectContaining({
        message: "environment file describes environment test, not prod",
      }),
    );
    expect(exec).not.toHaveBeenCalled();
  });

  it("should report missing stack templates", async () => {
    readFile.mockImplementation(async (path: string) => {
      if (path === "/workspace/stack.template.yml") {
        throw new Error("ENOENT");
      }

      return files[path];
    });

    await run();

    expect(core.setFailed).toHaveBeenCalledWith(
      expect.objectContaining({
        message:
          "Failed to read stack template /workspace/stack.template.yml: ENOENT",
      }),
    );
    expect(core.setOutput).toHaveBeenCalledExactlyOnceWith("status", "failure");
  });
});
