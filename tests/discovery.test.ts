import { describe, expect, it } from "vitest";
import {
  appendServiceDiscovery,
  groupServiceDiscoveries,
  resolveDiscovery,
  webServiceUri,
} from "../src/discovery.js";

describe("Service discovery", () => {
  describe("resolveDiscovery", () => {
    it("should build the private name of a service", () => {
      expect(resolveDiscovery("api", "shop", 8080)).toBe("api.shop.local:8080");
    });
  });

  describe("appendServiceDiscovery", () => {
    it("should create a group for a new namespace", () => {
      expect(appendServiceDiscovery([], "api.shop.local:80", "test")).toEqual([
        { environments: ["test"], namespace: "api.shop.local:80" },
      ]);
    });

    it("should add environments to the group of their namespace", () => {
      const groups = [
        { environments: ["test"], namespace: "api.shop.local:80" },
        { environments: ["prod"], namespace: "api.shop.local:443" },
      ];

      expect(
        appendServiceDiscovery(groups, "api.shop.local:80", "staging"),
      ).toEqual([
        { environments: ["test", "staging"], namespace: "api.shop.local:80" },
        { environments: ["prod"], namespace: "api.shop.local:443" },
      ]);
      expect(groups[0].environments).toEqual(["test"]);
    });
  });

  describe("groupServiceDiscoveries", () => {
    it("should group environments sharing a port", () => {
      expect(
        groupServiceDiscoveries(
          "api",
          "shop",
          new Map([
            ["test", 80],
            ["prod", 443],
            ["staging", 80],
          ]),
        ),
      ).toEqual([
        { environments: ["test", "staging"], namespace: "api.shop.local:80" },
        { environments: ["prod"], namespace: "api.shop.local:443" },
      ]);
    });
  });

  describe("webServiceUri", () => {
    it("should use the environment subdomain if there is one", () => {
      expect(
        webServiceUri(
          {
            EnvironmentSubdomain: "test.shop.example.com",
            PublicLoadBalancerDNSName: "lb.amazonaws.com",
          },
          "api",
          "api",
        ),
      ).toBe("https://api.test.shop.example.com");
    });

    it("should use the load balancer for the root path", () => {
      expect(
        webServiceUri({ PublicLoadBalancerDNSName: "lb.amazonaws.com" }, "api", "/"),
      ).toBe("http://lb.amazonaws.com");
    });

    it("should append the service path to the load balancer", () => {
      expect(
        webServiceUri(
          { PublicLoadBalancerDNSName: "lb.amazonaws.com" },
          "api",
          "/api",
        ),
      ).toBe("http://lb.amazonaws.com/api");
    });
  });
});
