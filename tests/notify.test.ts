import { describe, it, expect, vi, beforeEach } from "vitest";
import { EmailNotifier } from "../src/notify/notifier.js";
import { DestinationResolver } from "../src/notify/destinations.js";
import { PunchNotifications } from "../src/notify/messages.js";
import type { Notifier } from "../src/notify/notifier.js";
import { RecordingNotifier, silentLogger } from "./helpers.js";

const mailer = vi.hoisted(() => {
  const transport = {
    sendMail: vi.fn(async (_message: { to: string }) => ({ messageId: "test-id" })),
    close: vi.fn(),
  };
  return { transport, createTransport: vi.fn(() => transport) };
});

vi.mock("nodemailer", () => ({
  default: { createTransport: mailer.createTransport },
}));

const smtp = {
  host: "smtp.example.com",
  port: 587,
  user: "primary@example.com",
  password: "test-secret",
};

describe("EmailNotifier", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("sends one message per destination over STARTTLS", async () => {
    const notifier = new EmailNotifier(smtp, silentLogger);

    const delivered = await notifier.notify("Subject", "Body", ["a@example.com", "b@example.com"]);

    expect(delivered).toBe(true);
    expect(mailer.createTransport).toHaveBeenCalledWith({
      host: "smtp.example.com",
      port: 587,
      secure: false,
      requireTLS: true,
      auth: { user: "primary@example.com", pass: "test-secret" },
    });
    expect(mailer.transport.sendMail).toHaveBeenCalledTimes(2);
    expect(mailer.transport.sendMail).toHaveBeenNthCalledWith(1, {
      from: "primary@example.com",
      to: "a@example.com",
      subject: "Subject",
      text: "Body",
    });
    expect(mailer.transport.close).toHaveBeenCalledTimes(1);
  });

  it("uses implicit TLS on port 465", async () => {
    const notifier = new EmailNotifier({ ...smtp, port: 465 }, silentLogger);

    await notifier.notify("Subject", "Body", ["a@example.com"]);

    expect(mailer.createTransport).toHaveBeenCalledWith(
      expect.objectContaining({ secure: true, requireTLS: false }),
    );
  });

  it("succeeds when at least one destination accepts", async () => {
    mailer.transport.sendMail.mockRejectedValueOnce(new Error("mailbox unavailable"));
    const notifier = new EmailNotifier(smtp, silentLogger);

    const delivered = await notifier.notify("Subject", "Body", ["a@example.com", "b@example.com"]);

    expect(delivered).toBe(true);
    expect(mailer.transport.sendMail).toHaveBeenCalledTimes(2);
    expect(mailer.transport.close).toHaveBeenCalledTimes(1);
  });

  it("reports failure when every destination rejects", async () => {
    mailer.transport.sendMail.mockRejectedValue(new Error("auth failed"));
    const notifier = new EmailNotifier(smtp, silentLogger);

    const delivered = await notifier.notify("Subject", "Body", ["a@example.com"]);

    expect(delivered).toBe(false);
    expect(mailer.transport.close).toHaveBeenCalledTimes(1);
    mailer.transport.sendMail.mockReset();
    mailer.transport.sendMail.mockResolvedValue({ messageId: "test-id" });
  });

  it("does not open a transport without destinations", async () => {
    const notifier = new EmailNotifier(smtp, silentLogger);

    expect(await notifier.notify("Subject", "Body", [])).toBe(false);
    expect(mailer.createTransport).not.toHaveBeenCalled();
  });
});

describe("DestinationResolver", () => {
  const config = {
    primary: "primary@example.com",
    secondary: { address: "second@example.com", identifier: "12345678K" },
  };

  it("adds the secondary address only for its bound identifier", () => {
    const resolver = new DestinationResolver(config, false);

    expect(resolver.forIdentifier("12345678k")).toEqual(["primary@example.com", "second@example.com"]);
    expect(resolver.forIdentifier("12345678")).toEqual(["primary@example.com", "second@example.com"]);
    expect(resolver.forIdentifier("87654321k")).toEqual(["primary@example.com"]);
  });

  it("broadcasts to both addresses", () => {
    expect(new DestinationResolver(config, false).forBroadcast()).toEqual([
      "primary@example.com",
      "second@example.com",
    ]);
  });

  it("keeps everything on the primary address in simulation mode", () => {
    const resolver = new DestinationResolver(config, true);

    expect(resolver.forIdentifier("12345678k")).toEqual(["primary@example.com"]);
    expect(resolver.forBroadcast()).toEqual(["primary@example.com"]);
  });

  it("drops a secondary address equal to the primary", () => {
    const resolver = new DestinationResolver(
      { primary: "primary@example.com", secondary: { address: " primary@example.com ", identifier: "12345678k" } },
      false,
    );

    expect(resolver.forIdentifier("12345678k")).toEqual(["primary@example.com"]);
  });
});

describe("PunchNotifications", () => {
  const resolver = new DestinationResolver({ primary: "primary@example.com" }, false);

  it("composes the success notice", async () => {
    const notifier = new RecordingNotifier();
    const notifications = new PunchNotifications(notifier, resolver, silentLogger);

    await notifications.succeeded("12345678k", "1234*****", "SALIDA", "SALIDA completed", 1_500);

    expect(notifier.sent).toEqual([
      {
        subject: "✅ Punch confirmed (SALIDA) - 1234*****",
        body: "SALIDA completed\n\nProcessed in 1.5s.",
        destinations: ["primary@example.com"],
      },
    ]);
  });

  it("omits the attempt section when there were no attempts", async () => {
    const notifier = new RecordingNotifier();
    const notifications = new PunchNotifications(notifier, resolver, silentLogger);

    await notifications.failed("12345678k", "1234*****", "MARCAJE", "circuit open", []);

    expect(notifier.sent[0]?.body).toBe("❌ MARCAJE failed for 1234*****:\ncircuit open");
  });

  it("returns false instead of throwing when the transport throws", async () => {
    const broken: Notifier = {
      notify: async () => {
        throw new Error("connection refused");
      },
    };
    const notifications = new PunchNotifications(broken, resolver, silentLogger);

    await expect(notifications.skipped("12345678k", "1234*****", "2025-06-10 08:00:00")).resolves.toBe(false);
  });
});
