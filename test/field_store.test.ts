import { describe, it, expect } from "vitest";

import { buildFieldAccessors, FieldStore } from "../src/packets/field_store";
import type { Packet } from "../src/packets/packet";
import { PacketInvalidDataError } from "../src/packets/packet_errors";
import { createPacketSchema } from "../src/packets/packet_schema";
import { fixedClock, NotifyProjectInactivate, RequestAccountCreate } from "./fixtures/packet_types";

describe("Field accessors", () => {
  it("generates get/set/reset for required names and get/set for allowed names", () => {
    const schema = createPacketSchema({
      type: "probe",
      required: ["Alpha", "Beta"],
      allowed: ["Gamma"],
    });
    const store = new FieldStore(schema);
    const accessors = buildFieldAccessors(schema, store);

    expect([...accessors.required.keys()]).toEqual(["Alpha", "Beta"]);
    expect([...accessors.allowed.keys()]).toEqual(["Gamma"]);
    expect(accessors.allowed.get("Gamma")).not.toHaveProperty("reset");
  });

  it("writes required fields through the required store", () => {
    const packet = new RequestAccountCreate({ clock: fixedClock });
    const firstName = packet.requiredField("UserFirstName");

    firstName.set("Ada");
    expect(firstName.get()).toBe("Ada");
    expect(packet.requiredFields.UserFirstName).toBe("Ada");
  });

  it("resets a required field to null without dropping the key", () => {
    const packet = new RequestAccountCreate({
      clock: fixedClock,
      fields: { UserLastName: "Lovelace" },
    });

    packet.requiredField("UserLastName").reset();

    expect(packet.requiredFields).toHaveProperty("UserLastName", null);
    expect(Object.keys(packet.requiredFields)).toEqual([
      "GrantNumber",
      "UserFirstName",
      "UserLastName",
      "StartDate",
    ]);
  });

  it("only adds allowed fields once they are set", () => {
    const packet = new RequestAccountCreate({ clock: fixedClock });
    const email = packet.allowedField("UserEmail");

    expect(email.get()).toBeNull();
    expect(packet.allowedFields).toEqual({});

    email.set("ada@example.org");
    expect(packet.allowedFields).toEqual({ UserEmail: "ada@example.org" });
  });

  it("parses date-named fields written through an accessor", () => {
    const packet = new RequestAccountCreate({ clock: fixedClock });
    packet.requiredField("StartDate").set("2026-05-01T08:30:00Z");
    packet.allowedField("EndDate").set(new Date("2026-06-01T00:00:00Z"));

    expect(packet.requiredFields.StartDate).toEqual(new Date("2026-05-01T08:30:00.000Z"));
    expect(packet.allowedFields.EndDate).toEqual(new Date("2026-06-01T00:00:00.000Z"));
  });

  it("rejects a non-date value for a date-named field", () => {
    const packet = new RequestAccountCreate({ clock: fixedClock });
    try {
      packet.requiredField("StartDate").set(20260501);
      expect.unreachable("expected invalid_date");
    } catch (err) {
      expect(err).toBeInstanceOf(PacketInvalidDataError);
      if (err instanceof PacketInvalidDataError) {
        expect(err.code).toBe("invalid_date");
        expect(err.details.field).toBe("StartDate");
      }
    }
  });

  it("rejects names the schema does not declare", () => {
    const packet: Packet = new NotifyProjectInactivate({ clock: fixedClock });
    expect(() => packet.requiredField("Unknown")).toThrow(
      `Packet type 'notify_project_inactivate' declares no field "Unknown"`
    );
  });
});

describe("By-name field routing", () => {
  it("sets, reads and resets across all three stores", () => {
    const packet = new RequestAccountCreate({ clock: fixedClock });

    packet.setField("GrantNumber", "TG-1");
    packet.setField("UserEmail", "ada@example.org");
    packet.setField("Campus", "north");

    expect(packet.getField("GrantNumber")).toBe("TG-1");
    expect(packet.getField("UserEmail")).toBe("ada@example.org");
    expect(packet.getField("Campus")).toBe("north");
    expect(packet.getField("Missing")).toBeNull();

    packet.resetField("GrantNumber");
    packet.resetField("UserEmail");
    packet.resetField("Campus");

    expect(packet.requiredFields.GrantNumber).toBeNull();
    expect(packet.allowedFields).toEqual({});
    expect(packet.extensionFields).toEqual({});
  });

  it("keeps falsy values", () => {
    const packet = new RequestAccountCreate({ clock: fixedClock });
    packet.setField("GrantNumber", 0);
    packet.setField("Flag", false);

    expect(packet.getField("GrantNumber")).toBe(0);
    expect(packet.getField("Flag")).toBe(false);
  });
});
