import { LifecycleController, countGame } from "@/runtime/lifecycle.machine";

describe("@/runtime/lifecycle.machine — transitions", () => {
  test("starts in ready and only accepts START", () => {
    const ctl = new LifecycleController();
    expect(ctl.state).toBe("ready");
    expect(ctl.send({ type: "PAUSE" })).toBe(false);
    expect(ctl.send({ type: "RESTART" })).toBe(false);
    expect(ctl.state).toBe("ready");

    expect(ctl.send({ type: "START" })).toBe(true);
    expect(ctl.state).toBe("playing");
    expect(ctl.gamesStarted).toBe(1);
  });

  test("pause and resume", () => {
    const ctl = new LifecycleController();
    ctl.send({ type: "START" });
    expect(ctl.send({ type: "RESUME" })).toBe(false);
    expect(ctl.send({ type: "PAUSE" })).toBe(true);
    expect(ctl.state).toBe("paused");
    expect(ctl.send({ type: "PAUSE" })).toBe(false);
    expect(ctl.send({ type: "RESUME" })).toBe(true);
    expect(ctl.state).toBe("playing");
  });

  test("game over waits for a restart", () => {
    const ctl = new LifecycleController();
    ctl.send({ type: "START" });
    expect(ctl.send({ type: "GAME_OVER" })).toBe(true);
    expect(ctl.state).toBe("gameOver");
    expect(ctl.send({ type: "RESUME" })).toBe(false);
    expect(ctl.send({ type: "START" })).toBe(false);
    expect(ctl.send({ type: "RESTART" })).toBe(true);
    expect(ctl.state).toBe("playing");
    expect(ctl.gamesStarted).toBe(2);
  });

  test("every new game runs the begin hook", () => {
    const onGameBegin = jest.fn();
    const ctl = new LifecycleController(onGameBegin);
    ctl.send({ type: "START" });
    ctl.send({ type: "PAUSE" });
    ctl.send({ type: "RESTART" });
    ctl.send({ type: "RESTART" });
    expect(onGameBegin).toHaveBeenCalledTimes(3);
    expect(ctl.gamesStarted).toBe(3);
    expect(ctl.state).toBe("playing");
  });

  test("countGame only bumps the counter", () => {
    expect(countGame({ gamesStarted: 4 })).toEqual({ gamesStarted: 5 });
  });
});
