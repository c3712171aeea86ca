import { ELBv2Service } from "./elbv2-service";
import type { ElasticLoadBalancingV2Client } from "@aws-sdk/client-elastic-load-balancing-v2";
import {
  RegisterTargetsCommand,
  DescribeTargetHealthCommand,
} from "@aws-sdk/client-elastic-load-balancing-v2";

const TARGET_GROUP = "arn:aws:elasticloadbalancing:us-east-1:123:targetgroup/routers/abc";

describe("ELBv2Service", () => {
  let mockSend: jest.Mock;
  let service: ELBv2Service;

  beforeEach(() => {
    mockSend = jest.fn();
    service = new ELBv2Service({ send: mockSend } as unknown as ElasticLoadBalancingV2Client);
  });

  it("registers the instance as a single target", async () => {
    mockSend.mockResolvedValue({});

    await service.registerTarget(TARGET_GROUP, "i-abc");

    expect(mockSend).toHaveBeenCalledWith(expect.any(RegisterTargetsCommand));
    expect(mockSend.mock.calls[0][0].input).toEqual({
      TargetGroupArn: TARGET_GROUP,
      Targets: [{ Id: "i-abc" }],
    });
  });

  it("maps target health descriptions and skips entries without an id", async () => {
    mockSend.mockResolvedValue({
      TargetHealthDescriptions: [
        { Target: { Id: "i-abc", Port: 80 }, TargetHealth: { State: "initial", Reason: "Elb.RegistrationInProgress" } },
        { TargetHealth: { State: "unused" } },
        { Target: { Id: "i-def" }, TargetHealth: { State: "healthy" } },
      ],
    });

    const targets = await service.describeTargetHealth(TARGET_GROUP);

    expect(mockSend).toHaveBeenCalledWith(expect.any(DescribeTargetHealthCommand));
    expect(targets).toEqual([
      { targetId: "i-abc", port: 80, state: "initial", reason: "Elb.RegistrationInProgress" },
      { targetId: "i-def", port: undefined, state: "healthy", reason: undefined },
    ]);
  });

  it("returns an empty list for an empty target group", async () => {
    mockSend.mockResolvedValue({});

    await expect(service.describeTargetHealth(TARGET_GROUP)).resolves.toEqual([]);
  });
});
