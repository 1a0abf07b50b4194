/**
 * Tests for Channel
 *
 * The join/leave/rejoin state machine, push buffering, stale-epoch
 * filtering and reply waiters, driven through an in-process socket.
 */

import { isStateError, type Message } from "switchyard-shared";
import {
  createChannelClose,
  createChannelError,
  createReply,
  createTestMessage,
  flushMicrotasks,
} from "switchyard-shared/testing";
import { Channel } from "../channel";
import { configureChannels, resetChannelDefaults } from "../config";
import { FakeSocket } from "../testing";

/** Tracks whether `promise` has settled, either way */
function settledFlag(promise: Promise<unknown>): { settled: boolean } {
  const flag = { settled: false };
  promise.then(
    () => {
      flag.settled = true;
    },
    () => {
      flag.settled = true;
    },
  );
  return flag;
}

describe("Channel", () => {
  let socket: FakeSocket;
  let channel: Channel;

  function joinChannel(): void {
    channel.join();
    socket.reply(socket.lastSent("phx_join"), "ok");
  }

  function joinCount(): number {
    return socket.sentEvents("phx_join").length;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    socket = new FakeSocket();
    channel = socket.createChannel("room:1", {
      parameters: { token: "test-token" },
      timeout: 1000,
    });
  });

  afterEach(() => {
    channel.close();
    resetChannelDefaults();
    vi.useRealTimers();
  });

  // ===========================================================================
  // join
  // ===========================================================================

  describe("join", () => {
    it("should start closed", () => {
      expect(channel.state).toBe("closed");
      expect(channel.joinedOnce).toBe(false);
      expect(channel.joinRef).toBeUndefined();
    });

    it("should send the join with parameters under a new join ref", () => {
      const push = channel.join();

      expect(channel.state).toBe("joining");
      expect(channel.joinedOnce).toBe(true);
      expect(push.ref).toBe("1");
      expect(channel.joinRef).toBe("1");
      expect(socket.sent).toEqual([
        {
          event: "phx_join",
          payload: { token: "test-token" },
          topic: "room:1",
          ref: "1",
          joinRef: "1",
        },
      ]);
    });

    it("should become joined on an ok reply", async () => {
      const push = channel.join();
      socket.reply(socket.lastSent("phx_join"), "ok", { user: "u1" });

      expect(channel.state).toBe("joined");
      expect(channel.isJoined).toBe(true);
      await expect(push.future).resolves.toEqual({ status: "ok", response: { user: "u1" } });
    });

    it("should fail a second join without side effects", () => {
      channel.join();

      let thrown: unknown;
      try {
        channel.join();
      } catch (error) {
        thrown = error;
      }

      expect(isStateError(thrown)).toBe(true);
      expect(thrown).toMatchObject({ code: "STATE_ALREADY_JOINED" });
      expect(channel.state).toBe("joining");
      expect(joinCount()).toBe(1);
    });

    it("should take the timeout passed to join", () => {
      channel.join(500);

      expect(channel.timeout).toBe(500);
      vi.advanceTimersByTime(500);
      expect(channel.state).toBe("errored");
    });

    it("should call the caller's ok callback and still join", () => {
      const ok = vi.fn();
      channel.join().onReply("ok", ok);

      socket.reply(socket.lastSent("phx_join"), "ok");

      expect(ok).toHaveBeenCalledWith({ status: "ok", response: {} });
      expect(channel.state).toBe("joined");
    });
  });

  // ===========================================================================
  // push
  // ===========================================================================

  describe("push", () => {
    it("should fail before join", () => {
      expect(() => channel.push("new_msg", {})).toThrow(
        'Tried to push on channel "room:1" before joining it',
      );
      expect(socket.sent).toHaveLength(0);
    });

    it("should send immediately when joined", () => {
      joinChannel();

      const push = channel.push("new_msg", { body: "hi" });

      expect(push.sent).toBe(true);
      expect(socket.lastSent()).toEqual({
        event: "new_msg",
        payload: { body: "hi" },
        topic: "room:1",
        ref: "2",
        joinRef: "1",
      });
    });

    it("should buffer until joined, then flush once in order", () => {
      channel.join();
      const a = channel.push("a", { i: 1 });
      const b = channel.push("b", { i: 2 });
      const c = channel.push("c", { i: 3 });

      expect(channel.pushBuffer).toEqual([a, b, c]);
      expect(socket.sent.map((message) => message.event)).toEqual(["phx_join"]);

      socket.reply(socket.lastSent("phx_join"), "ok");

      expect(socket.sent.map((message) => message.event)).toEqual(["phx_join", "a", "b", "c"]);
      expect(channel.pushBuffer).toHaveLength(0);
      expect([a.sent, b.sent, c.sent]).toEqual([true, true, true]);
    });

    it("should buffer while the socket is disconnected", () => {
      joinChannel();
      socket.connected = false;

      channel.push("new_msg", {});

      expect(channel.canPush).toBe(false);
      expect(channel.pushBuffer).toHaveLength(1);
      expect(socket.sentEvents("new_msg")).toHaveLength(0);
    });

    it("should resolve the push future with its reply", async () => {
      joinChannel();
      const push = channel.push("new_msg", {});

      socket.reply(socket.lastSent("new_msg"), "ok", { id: 7 });

      await expect(push.future).resolves.toEqual({ status: "ok", response: { id: 7 } });
    });

    it("should send reserved events through pushEvent", () => {
      joinChannel();

      channel.pushEvent("heartbeat", {});

      expect(socket.lastSent()?.event).toBe("heartbeat");
    });
  });

  // ===========================================================================
  // Join failures and rejoin
  // ===========================================================================

  describe("join failures", () => {
    it("should rejoin after an error reply when connected", () => {
      channel.join();
      socket.reply(socket.lastSent("phx_join"), "error", { reason: "unauthorized" });

      expect(channel.state).toBe("errored");
      vi.advanceTimersByTime(999);
      expect(joinCount()).toBe(1);

      vi.advanceTimersByTime(1);
      expect(joinCount()).toBe(2);
      expect(channel.state).toBe("joining");
      expect(socket.lastSent("phx_join")).toMatchObject({ ref: "2", joinRef: "2" });
    });

    it("should not schedule a rejoin after an error reply while disconnected", () => {
      channel.join();
      socket.connected = false;
      socket.reply(socket.lastSent("phx_join"), "error");

      vi.advanceTimersByTime(5000);

      expect(channel.state).toBe("errored");
      expect(joinCount()).toBe(1);
    });

    it("should leave, error and rejoin after a join timeout", () => {
      channel.join();

      vi.advanceTimersByTime(1000);

      expect(socket.sentEvents("phx_leave")).toEqual([
        { event: "phx_leave", payload: {}, topic: "room:1", ref: "2", joinRef: "1" },
      ]);
      expect(channel.state).toBe("errored");
      expect(channel.joinRef).toBeUndefined();

      vi.advanceTimersByTime(999);
      expect(joinCount()).toBe(1);

      vi.advanceTimersByTime(1);
      expect(joinCount()).toBe(2);
      expect(channel.state).toBe("joining");
      expect(channel.joinRef).toBe("3");
    });

    it("should wait for the socket to open after a timeout while disconnected", () => {
      channel.join();
      socket.connected = false;

      vi.advanceTimersByTime(5000);
      expect(channel.state).toBe("errored");
      expect(joinCount()).toBe(1);

      socket.open();

      expect(joinCount()).toBe(2);
      expect(channel.state).toBe("joining");
    });

    it("should settle the join future when an error event arrives while joining", async () => {
      const join = channel.join();
      const onError = vi.fn();
      join.onReply("error", onError);

      socket.deliver(createChannelError("room:1", "1"));

      await expect(join.future).resolves.toEqual({ status: "error", response: {} });
      expect(onError).toHaveBeenCalledTimes(1);
      expect(channel.state).toBe("errored");

      vi.advanceTimersByTime(1000);
      expect(joinCount()).toBe(2);
    });

    it("should join on the ok reply of a later attempt", () => {
      channel.join();
      socket.reply(socket.lastSent("phx_join"), "error");
      vi.advanceTimersByTime(1000);

      socket.reply(socket.lastSent("phx_join"), "ok");

      expect(channel.state).toBe("joined");
    });
  });

  // ===========================================================================
  // Stale join epochs
  // ===========================================================================

  describe("stale messages", () => {
    it("should drop a reply from a superseded join attempt", () => {
      channel.join();
      vi.advanceTimersByTime(2000);
      expect(channel.joinRef).toBe("3");

      const listener = vi.fn();
      channel.messages.subscribe(listener);
      socket.deliver(createReply("room:1", "1", "ok", { joinRef: "1" }));

      expect(listener).not.toHaveBeenCalled();
      expect(channel.state).toBe("joining");

      socket.reply(socket.lastSent("phx_join"), "ok");
      expect(channel.state).toBe("joined");
    });

    it("should not complete waiters with stale status messages", async () => {
      joinChannel();
      const waiter = channel.onPushReply("phx_error");
      const flag = settledFlag(waiter);

      socket.deliver(createChannelError("room:1", "99"));
      await flushMicrotasks();

      expect(flag.settled).toBe(false);
      expect(channel.state).toBe("joined");
    });

    it("should deliver application events whatever their join ref", () => {
      joinChannel();
      const listener = vi.fn();
      channel.messages.subscribe(listener);
      const message = createTestMessage("room:1", "new_msg", { body: "hi" }, { joinRef: "99" });

      socket.deliver(message);

      expect(listener).toHaveBeenCalledWith(message);
    });

    it("should drop late replies once the join attempt was reset by an error", () => {
      channel.join();
      socket.deliver(createChannelError("room:1", "1"));

      expect(channel.state).toBe("errored");
      expect(channel.joinRef).toBeUndefined();

      socket.deliver(createReply("room:1", "1", "ok", { joinRef: "1" }));
      expect(channel.state).toBe("errored");
    });
  });

  // ===========================================================================
  // Inbound dispatch
  // ===========================================================================

  describe("inbound messages", () => {
    it("should publish application messages", () => {
      joinChannel();
      const listener = vi.fn();
      channel.messages.subscribe(listener);
      const message = createTestMessage("room:1", "new_msg", { body: "hi" });

      socket.deliver(message);

      expect(listener).toHaveBeenCalledWith(message);
    });

    it("should republish replies under their per-push reply event", () => {
      joinChannel();
      const events: Message[] = [];
      channel.messages.subscribe((message) => events.push(message));
      channel.push("new_msg", {});

      socket.reply(socket.lastSent("new_msg"), "ok");

      expect(events.map((message) => message.event)).toEqual(["phx_reply", "chan_reply_2"]);
      expect(events[1]).toEqual({
        event: "chan_reply_2",
        payload: { status: "ok", response: {} },
        topic: "room:1",
        ref: "2",
        joinRef: "1",
      });
    });

    it("should close on a close event", () => {
      joinChannel();

      socket.deliver(createChannelClose("room:1", "1"));

      expect(channel.state).toBe("closed");
      expect(channel.messages.closed).toBe(true);
      expect(socket.removed).toEqual([channel]);
    });

    it("should complete a close waiter before closing", async () => {
      joinChannel();
      const closed = channel.onPushReply("phx_close");

      socket.deliver(createChannelClose("room:1", "1"));

      await expect(closed).resolves.toMatchObject({ event: "phx_close", topic: "room:1" });
    });

    it("should error and schedule a rejoin on an error event", () => {
      joinChannel();

      socket.deliver(createChannelError("room:1", "1"));
      expect(channel.state).toBe("errored");

      vi.advanceTimersByTime(1000);
      expect(joinCount()).toBe(2);
      expect(channel.joinRef).toBe("2");
    });
  });

  // ===========================================================================
  // Reply waiters
  // ===========================================================================

  describe("onPushReply", () => {
    it("should resolve with the next message of the event", async () => {
      joinChannel();
      const next = channel.onPushReply("new_msg");
      const message = createTestMessage("room:1", "new_msg", { body: "hi" });

      socket.deliver(message);

      await expect(next).resolves.toEqual(message);
    });

    it("should abandon a replaced waiter by default", async () => {
      joinChannel();
      const first = channel.onPushReply("new_msg");
      const flag = settledFlag(first);
      const second = channel.onPushReply("new_msg");

      socket.deliver(createTestMessage("room:1", "new_msg"));
      await flushMicrotasks();

      await expect(second).resolves.toMatchObject({ event: "new_msg" });
      expect(flag.settled).toBe(false);
    });

    it("should reject a replaced waiter under the fail policy", async () => {
      const strict = socket.createChannel("room:2", { waiterConflict: "fail" });
      const first = strict.onPushReply("new_msg");
      const second = strict.onPushReply("new_msg");

      await expect(first).rejects.toMatchObject({ code: "STATE_WAITER_REPLACED" });
      socket.deliver(createTestMessage("room:2", "new_msg"));
      await expect(second).resolves.toMatchObject({ event: "new_msg" });
      strict.close();
    });

    it("should take the conflict policy from the global defaults", async () => {
      configureChannels({ waiterConflict: "fail" });
      const strict = socket.createChannel("room:2");

      const first = strict.onPushReply("new_msg");
      strict.onPushReply("new_msg");

      await expect(first).rejects.toMatchObject({ code: "STATE_WAITER_REPLACED" });
      strict.close();
    });

    it("should reject on a closed channel", async () => {
      channel.close();

      await expect(channel.onPushReply("new_msg")).rejects.toMatchObject({ code: "STATE_CLOSED" });
    });
  });

  // ===========================================================================
  // triggerError
  // ===========================================================================

  describe("triggerError", () => {
    it("should publish an error, fail waiters and schedule a rejoin", async () => {
      joinChannel();
      const waiter = channel.onPushReply("new_msg");
      const listener = vi.fn();
      channel.messages.subscribe(listener);

      channel.triggerError(new Error("boom"));

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith({
        event: "phx_error",
        payload: { reason: "boom" },
        topic: "room:1",
      });
      await expect(waiter).rejects.toThrow("boom");
      expect(channel.state).toBe("errored");

      vi.advanceTimersByTime(1000);
      expect(joinCount()).toBe(2);
    });

    it("should be idempotent", () => {
      joinChannel();
      const listener = vi.fn();
      channel.messages.subscribe(listener);

      channel.triggerError(new Error("first"));
      vi.advanceTimersByTime(500);
      channel.triggerError(new Error("second"));

      expect(listener).toHaveBeenCalledTimes(1);
      vi.advanceTimersByTime(500);
      expect(joinCount()).toBe(2);
    });

    it("should fail waiters only once", async () => {
      joinChannel();
      channel.triggerError(new Error("first"));
      const waiter = channel.onPushReply("new_msg");
      const flag = settledFlag(waiter);

      channel.triggerError(new Error("second"));
      await flushMicrotasks();

      expect(flag.settled).toBe(false);
    });

    it("should be ignored before join", () => {
      const listener = vi.fn();
      channel.messages.subscribe(listener);

      channel.triggerError(new Error("boom"));

      expect(listener).not.toHaveBeenCalled();
      expect(channel.state).toBe("closed");
    });

    it("should reset an in-flight join", () => {
      channel.join();

      channel.triggerError(new Error("boom"));

      expect(channel.joinRef).toBeUndefined();
      expect(channel.state).toBe("errored");
    });

    it("should not schedule a rejoin while disconnected", () => {
      joinChannel();
      socket.connected = false;

      channel.triggerError(new Error("boom"));
      vi.advanceTimersByTime(5000);

      expect(joinCount()).toBe(1);
    });

    it("should stay leaving when a subscriber leaves from the error message", () => {
      joinChannel();
      channel.messages.subscribe((message) => {
        if (message.event === "phx_error") {
          channel.leave();
        }
      });

      channel.triggerError(new Error("boom"));

      expect(channel.state).toBe("leaving");
      expect(socket.sentEvents("phx_leave")).toHaveLength(1);

      socket.reply(socket.lastSent("phx_leave"), "ok");
      expect(channel.state).toBe("closed");
      expect(joinCount()).toBe(1);
    });

    it("should keep the channel joined when a reply callback throws", async () => {
      joinChannel();
      const other = channel.push("other", {});
      channel.push("new_msg", {}).onReply("ok", () => {
        throw new Error("callback failed");
      });

      socket.reply(socket.lastSent("new_msg"), "ok");
      expect(channel.state).toBe("joined");

      socket.reply(socket.lastSent("other"), "ok", { n: 1 });
      await expect(other.future).resolves.toEqual({ status: "ok", response: { n: 1 } });
      expect(joinCount()).toBe(1);
    });
  });

  // ===========================================================================
  // Socket lifecycle
  // ===========================================================================

  describe("socket lifecycle", () => {
    it("should rejoin on its own after the connection drops and reopens", () => {
      joinChannel();

      socket.fail();
      expect(channel.state).toBe("errored");
      expect(joinCount()).toBe(1);

      socket.open();
      expect(channel.state).toBe("joining");
      expect(joinCount()).toBe(2);

      socket.reply(socket.lastSent("phx_join"), "ok");
      expect(channel.state).toBe("joined");
    });

    it("should rejoin at once on open instead of waiting for the timer", () => {
      channel.join();
      socket.reply(socket.lastSent("phx_join"), "error");

      socket.open();
      expect(joinCount()).toBe(2);

      vi.advanceTimersByTime(999);
      expect(joinCount()).toBe(2);
    });

    it("should cancel the rejoin timer on a connection error", () => {
      channel.join();
      socket.reply(socket.lastSent("phx_join"), "error");

      socket.fail();
      socket.connected = true;
      vi.advanceTimersByTime(5000);

      expect(joinCount()).toBe(1);
    });

    it("should ignore open while joined", () => {
      joinChannel();

      socket.open();

      expect(channel.state).toBe("joined");
      expect(joinCount()).toBe(1);
    });
  });

  // ===========================================================================
  // leave
  // ===========================================================================

  describe("leave", () => {
    it("should complete at once without sending when it cannot push", async () => {
      channel.join();
      socket.connected = false;

      const push = channel.leave();

      expect(push.received).toEqual({ status: "ok", response: {} });
      expect(socket.sentEvents("phx_leave")).toHaveLength(0);
      expect(channel.state).toBe("closed");
      expect(socket.removed).toEqual([channel]);
      await expect(push.future).resolves.toEqual({ status: "ok", response: {} });
    });

    it("should send the leave when joined and close on its reply", () => {
      joinChannel();
      const listener = vi.fn();
      channel.messages.subscribe(listener);

      channel.leave();

      expect(channel.state).toBe("leaving");
      expect(socket.sentEvents("phx_leave")).toEqual([
        { event: "phx_leave", payload: {}, topic: "room:1", ref: "2", joinRef: "1" },
      ]);

      socket.reply(socket.lastSent("phx_leave"), "ok");

      expect(channel.state).toBe("closed");
      expect(listener).toHaveBeenLastCalledWith({
        event: "phx_close",
        payload: { ok: "leave" },
        topic: "room:1",
      });
    });

    it("should close when the leave times out", () => {
      joinChannel();

      channel.leave();
      vi.advanceTimersByTime(1000);

      expect(channel.state).toBe("closed");
    });

    it("should cancel the join timeout", () => {
      channel.join();

      channel.leave();
      vi.advanceTimersByTime(5000);

      expect(socket.sentEvents("phx_leave")).toHaveLength(0);
      expect(joinCount()).toBe(1);
    });

    it("should close a channel that was never joined", () => {
      channel.leave();

      expect(channel.state).toBe("closed");
      expect(() => channel.join()).toThrow('Channel "room:1" is closed');
    });
  });

  // ===========================================================================
  // close
  // ===========================================================================

  describe("close", () => {
    it("should deregister once however often it is called", () => {
      joinChannel();

      channel.close();
      channel.close();

      expect(socket.removed).toEqual([channel]);
      expect(channel.state).toBe("closed");
      expect(channel.messages.closed).toBe(true);
    });

    it("should drop buffered pushes and cancel timers", () => {
      channel.join();
      channel.push("new_msg", {});
      socket.reply(socket.lastSent("phx_join"), "error");

      channel.close();
      vi.advanceTimersByTime(5000);

      expect(channel.pushBuffer).toHaveLength(0);
      expect(channel.scope.timerCount).toBe(0);
      expect(joinCount()).toBe(1);
    });

    it("should release its socket subscriptions", () => {
      expect(socket.subscriberCount).toBe(3);

      channel.close();

      expect(socket.subscriberCount).toBe(0);
    });

    it("should reject join and push afterwards", () => {
      channel.close();

      expect(() => channel.join()).toThrow('Channel "room:1" is closed');
      expect(() => channel.push("new_msg", {})).toThrow('Channel "room:1" is closed');
    });

    it("should ignore trigger and triggerError afterwards", () => {
      joinChannel();
      channel.close();

      channel.trigger(createTestMessage("room:1", "new_msg"));
      channel.triggerError(new Error("boom"));

      expect(channel.state).toBe("closed");
    });
  });
});
