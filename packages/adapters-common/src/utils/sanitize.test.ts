import { sanitizeRoleSessionName } from "./sanitize";

describe("sanitizeRoleSessionName", () => {
  it("keeps allowed characters", () => {
    expect(sanitizeRoleSessionName("monitor-i-0abc123")).toBe("monitor-i-0abc123");
  });

  it("replaces disallowed characters", () => {
    expect(sanitizeRoleSessionName("monitor i/1")).toBe("monitor-i-1");
  });

  it("truncates to 64 characters", () => {
    expect(sanitizeRoleSessionName("m".repeat(80))).toHaveLength(64);
  });

  it("rejects names shorter than two characters", () => {
    expect(() => sanitizeRoleSessionName("x")).toThrow('Invalid role session name: "x"');
  });
});
