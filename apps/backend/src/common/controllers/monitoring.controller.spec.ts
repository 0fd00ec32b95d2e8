import { MonitoringController } from "./monitoring.controller";

describe("MonitoringController", () => {
  it("reports health and the supported year range", () => {
    const health = new MonitoringController().checkHealth();
    expect(health.status).toBe("healthy");
    expect(health.supportedYears).toEqual({ from: 1900, to: 2100 });
    expect(typeof health.timestamp).toBe("string");
  });
});
