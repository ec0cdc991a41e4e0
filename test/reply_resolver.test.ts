import { describe, it, expect } from "vitest";

import { PacketInvalidTypeError } from "../src/packets/packet_errors";
import { replyPacket, resolveReplyType } from "../src/packets/reply_resolver";
import {
  createTestLogger,
  createTestRegistry,
  FIXED_NOW,
  fixedClock,
  InformTransactionComplete,
  NotifyAccountCreate,
  NotifyProjectInactivate,
  RequestAccountCreate,
  RequestProjectInactivate,
} from "./fixtures/packet_types";

function expectInvalidType(run: () => unknown, code: string, message: string) {
  try {
    run();
    expect.unreachable(`expected ${code}`);
  } catch (err) {
    expect(err).toBeInstanceOf(PacketInvalidTypeError);
    if (err instanceof PacketInvalidTypeError) {
      expect(err.code).toBe(code);
      expect(err.message).toBe(message);
    }
  }
}

describe("Reply resolution", () => {
  const registry = createTestRegistry();

  it("builds the sole expected reply linked to the source", () => {
    const source = new RequestAccountCreate({ packetId: "1001", clock: fixedClock });

    const reply = registry.replyTo(source, { packetId: "1002" });

    expect(reply).toBeInstanceOf(NotifyAccountCreate);
    expect(reply.packetId).toBe("1002");
    expect(reply.inReplyToId).toBe("1001");
    expect(reply.timestamp.toISOString()).toBe(FIXED_NOW);
  });

  it("leaves the reply id unset when none is given", () => {
    const source = new RequestAccountCreate({ packetId: "1001", clock: fixedClock });
    const reply = replyPacket(registry, source);
    expect(reply.packetId).toBeNull();
    expect(reply.requiredFields).toEqual({ GrantNumber: null, UserPersonID: null });
  });

  it("fails for a type that expects no reply", () => {
    const source = new InformTransactionComplete({ packetId: "9", clock: fixedClock });

    expectInvalidType(
      () => registry.replyTo(source),
      "no_reply_expected",
      "Packet type 'inform_transaction_complete' does not expect a reply"
    );
    expectInvalidType(
      () => registry.replyTo(source, { packetType: "notify_account_create" }),
      "no_reply_expected",
      "Packet type 'inform_transaction_complete' does not expect a reply"
    );
  });

  it("requires a type when more than one reply is expected", () => {
    const source = new RequestProjectInactivate({ packetId: "20", clock: fixedClock });

    expectInvalidType(
      () => registry.replyTo(source),
      "ambiguous_reply",
      "Packet type 'request_project_inactivate' has more than one expected response. Specify a packet type for the reply"
    );
  });

  it("accepts a requested type from the expected list", () => {
    const source = new RequestProjectInactivate({ packetId: "20", clock: fixedClock });

    const notify = registry.replyTo(source, { packetType: "notify_project_inactivate" });
    const inform = registry.replyTo(source, { packetType: "inform_transaction_complete" });

    expect(notify).toBeInstanceOf(NotifyProjectInactivate);
    expect(inform).toBeInstanceOf(InformTransactionComplete);
    expect(notify.inReplyToId).toBe("20");
  });

  it("rejects a requested type outside the expected list", () => {
    const source = new RequestProjectInactivate({ packetId: "20", clock: fixedClock });

    expectInvalidType(
      () => registry.replyTo(source, { packetType: "notify_account_create" }),
      "unexpected_reply",
      "'notify_account_create' is not an expected reply for packet type 'request_project_inactivate'"
    );
  });

  it("skips the checks when forced", () => {
    const source = new InformTransactionComplete({ packetId: "9", clock: fixedClock });

    const reply = registry.replyTo(source, { packetType: "notify_account_create", force: true });

    expect(reply).toBeInstanceOf(NotifyAccountCreate);
    expect(reply.inReplyToId).toBe("9");
  });

  it("still needs a registered type when forced", () => {
    const source = new InformTransactionComplete({ packetId: "9", clock: fixedClock });
    expectInvalidType(
      () => resolveReplyType(registry, source, { packetType: "request_mystery", force: true }),
      "unknown_type",
      "No packet type matches provided 'request_mystery'"
    );
  });

  it("ignores force without a requested type", () => {
    const source = new RequestProjectInactivate({ packetId: "20", clock: fixedClock });
    expectInvalidType(
      () => registry.replyTo(source, { force: true }),
      "ambiguous_reply",
      "Packet type 'request_project_inactivate' has more than one expected response. Specify a packet type for the reply"
    );
  });

  it("logs the created reply at debug", () => {
    const log = createTestLogger();
    const logged = createTestRegistry({ log });
    const source = new RequestAccountCreate({ packetId: "1001", clock: fixedClock });

    logged.replyTo(source);

    expect(log.debug).toHaveBeenLastCalledWith(
      { source: "request_account_create", reply: "notify_account_create", inReplyTo: "1001" },
      "packet.reply: created"
    );
  });
});
