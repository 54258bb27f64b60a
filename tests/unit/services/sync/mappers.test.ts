import { describe, it, expect } from "vitest";

import {
  RecordMappingError,
  extractExternalId,
  extractGlAccountNumber,
  mapRecord,
  mapUnitStatus,
  mapWorkOrderPriority,
  mapWorkOrderStatus,
  parseAmount,
  readDate,
} from "../../../../src/services/sync/mappers.js";
import {
  leaseRecord,
  propertyRecord,
  unitRecord,
} from "../../../fixtures/remote.js";

describe("services/sync/mappers", () => {
  describe("parseAmount", () => {
    it.each([
      ["$1,234.50", 1234.5],
      [" 950 ", 950],
      ["-12.5", -12.5],
      [42, 42],
    ])("should parse %j", (input, expected) => {
      expect(parseAmount(input)).toBe(expected);
    });

    it.each([null, "", "n/a", Number.NaN])("should return null for %j", (input) => {
      expect(parseAmount(input)).toBeNull();
    });
  });

  describe("vocabularies", () => {
    it("should normalise unit statuses", () => {
      expect(mapUnitStatus("Rented")).toBe("occupied");
      expect(mapUnitStatus("Not Ready")).toBe("not_ready");
      expect(mapUnitStatus("something else")).toBe("vacant");
      expect(mapUnitStatus(null)).toBe("vacant");
    });

    it("should normalise work order statuses and priorities", () => {
      expect(mapWorkOrderStatus("Assigned")).toBe("in_progress");
      expect(mapWorkOrderStatus("Canceled")).toBe("cancelled");
      expect(mapWorkOrderPriority("Critical")).toBe("emergency");
      expect(mapWorkOrderPriority(null)).toBe("normal");
    });
  });

  describe("field readers", () => {
    it("should accept ISO and US dates", () => {
      expect(readDate({ d: "2024-02-03T10:00:00Z" }, ["d"])).toBe("2024-02-03");
      expect(readDate({ d: "2/3/2024" }, ["d"])).toBe("2024-02-03");
    });

    it("should reject unparseable dates", () => {
      expect(() => readDate({ d: "soon" }, ["d"])).toThrow(
        "Unparseable date 'soon'"
      );
    });

    it("should extract the numeric prefix of a GL account", () => {
      expect(extractGlAccountNumber({ account_number: "6210 - Water" })).toBe("6210");
      expect(extractGlAccountNumber({ account: "Utilities" })).toBe("Utilities");
      expect(extractGlAccountNumber({})).toBeNull();
    });

    it("should pick the first present external id field", () => {
      expect(extractExternalId("leases", { lease_id: 7, id: 9 })).toBe("7");
      expect(extractExternalId("leases", { occupancy_id: "", id: 9 })).toBe("9");
      expect(extractExternalId("units", {})).toBeNull();
    });
  });

  describe("mapRecord", () => {
    it("should map a property", () => {
      const mapped = mapRecord("properties", propertyRecord(10));

      expect(mapped).toEqual({
        resourceType: "properties",
        externalId: "10",
        references: {},
        values: {
          name: "Building 10",
          address_line1: "10 Main St",
          address_line2: null,
          city: "Springfield",
          state: null,
          zip: null,
          county: null,
          property_type: "Multi-Family",
          unit_count: 12,
          portfolio: null,
          is_active: true,
        },
      });
    });

    it("should mark hidden properties inactive", () => {
      const mapped = mapRecord(
        "properties",
        propertyRecord(10, { visibility: "Hidden" })
      );

      expect(mapped.values).toMatchObject({ is_active: false });
    });

    it("should map a unit with its property reference", () => {
      const mapped = mapRecord("units", unitRecord(20, 10));

      expect(mapped.externalId).toBe("20");
      expect(mapped.references).toEqual({ property: "10" });
      expect(mapped.values).toMatchObject({
        unit_number: "Unit 20",
        status: "vacant",
        market_rent: 1250,
        rentable: true,
      });
    });

    it("should read nested reference objects", () => {
      const mapped = mapRecord("units", {
        unit_id: 21,
        property: { id: 10, name: "Building 10" },
      });

      expect(mapped.references).toEqual({ property: "10" });
    });

    it("should map a lease", () => {
      const mapped = mapRecord("leases", leaseRecord(30, 20));

      expect(mapped.references).toEqual({ unit: "20" });
      expect(mapped.values).toEqual({
        tenant_name: "Test Tenant",
        start_date: "2024-01-01",
        end_date: "2024-12-31",
        rent: 1200,
        security_deposit: null,
        status: "active",
      });
    });

    it("should map an expense with its optional references", () => {
      const mapped = mapRecord("expenses", {
        txn_id: 500,
        property_id: 10,
        vendor_id: 40,
        account_number: "6210 - Water",
        paid: "$80.00",
        bill_date: "03/15/2024",
      });

      expect(mapped.references).toEqual({
        property: "10",
        unit: null,
        vendor: "40",
      });
      expect(mapped.values).toMatchObject({
        gl_account_number: "6210",
        amount: 80,
        paid: 80,
        bill_date: "2024-03-15",
      });
    });

    it("should fail without an external id", () => {
      expect(() => mapRecord("vendors", { name: "Acme" })).toThrow(
        new RecordMappingError(
          "Missing external id (expected one of vendor_id, id)"
        )
      );
    });

    it("should fail on a malformed amount", () => {
      expect(() =>
        mapRecord("units", unitRecord(20, 10, { market_rent: "call us" }))
      ).toThrow("Field 'market_rent' is not a valid amount");
    });
  });
});
