import { assert, assertApprox, createManualClock, describe, test } from "@tween-ui/testkit";
import { AnimationManager } from "../../animation/manager.js";
import { parseColor } from "../../color/color.js";
import { isTweenError } from "../../errors.js";
import { createLogger } from "../../logging.js";
import { HeadlessHost } from "../../render/headless.js";
import { AnimatedSwitch, type AnimatedSwitchOptions } from "../switch.js";

const TRACK_ON = parseColor("#4299e1");
const TRACK_OFF = parseColor("#cbd5e0");
const TRACK_DISABLED = parseColor("#e2e8f0");

const SETTLE_MS = 400;

function setup(options: AnimatedSwitchOptions = {}) {
  const clock = createManualClock();
  const logger = createLogger({ level: "silent" });
  const manager = new AnimationManager({ clock, logger });
  const toggle = new AnimatedSwitch({ id: "sw", manager, logger, ...options });
  return { clock, manager, toggle };
}

describe("AnimatedSwitch", () => {
  test("starts off with the off track and a left thumb", () => {
    const { toggle } = setup();
    const appearance = toggle.getAppearance();
    assert.equal(toggle.isOn(), false);
    assert.deepEqual(appearance.background, TRACK_OFF);
    assert.equal(appearance.indicator, 0);
    assert.equal(appearance.width, 60);
    assert.equal(appearance.height, 30);
    assert.equal(appearance.label, "off");
    assert.deepEqual(appearance.accent, parseColor("#ffffff"));
    assert.deepEqual(appearance.shadow, parseColor("#000000"));
  });

  test("labels carry the state text", () => {
    assert.equal(setup({ label: "Wifi", on: true }).toggle.getAppearance().label, "Wifi: on");
    const quiet = setup({ label: "Wifi", style: { onLabel: "", offLabel: "" } }).toggle;
    assert.equal(quiet.getAppearance().label, "Wifi");
  });

  test("toggling slides the thumb and recolors the track", () => {
    const { clock, toggle } = setup();
    const events: string[] = [];
    toggle.onSwitchedOn(() => events.push("on"));
    toggle.onSwitchedOff(() => events.push("off"));

    toggle.toggle();
    assert.equal(toggle.isOn(), true);
    assert.deepEqual(events, ["on"]);
    clock.advance(150);
    const midway = toggle.getProperty("indicator");
    assert.ok(midway > 0 && midway < 1);

    clock.advance(SETTLE_MS);
    assert.equal(toggle.getProperty("indicator"), 1);
    assert.deepEqual(toggle.getProperty("background"), TRACK_ON);

    toggle.setOn(false, false);
    assert.deepEqual(events, ["on", "off"]);
    assert.equal(toggle.getProperty("indicator"), 0);
    assert.deepEqual(toggle.getProperty("background"), TRACK_OFF);
  });

  test("click toggles through the rendered surface", () => {
    const { toggle } = setup();
    const host = new HeadlessHost();
    toggle.render(host, "headless");
    const surface = host.find("sw");
    assert.ok(surface !== undefined);

    surface.dispatch("click");
    assert.equal(toggle.isOn(), true);
    assert.equal(surface.latest?.label, "on");
  });

  test("hover and press scale the switch", () => {
    const { clock, toggle } = setup();
    toggle.hoverEnter();
    clock.advance(SETTLE_MS);
    assertApprox(toggle.getProperty("scale"), 1.05);
    toggle.press();
    clock.advance(SETTLE_MS);
    assertApprox(toggle.getProperty("scale"), 0.95);
  });

  test("disabled switches grey the track and ignore clicks", () => {
    const { clock, toggle } = setup({ on: true });
    toggle.disable();
    clock.advance(SETTLE_MS);
    assert.deepEqual(toggle.getProperty("background"), TRACK_DISABLED);
    assert.equal(toggle.getProperty("indicator"), 1);
    toggle.click();
    assert.equal(toggle.isOn(), true);
  });

  test("setColors recolors the current track at once", () => {
    const { toggle } = setup({ on: true });
    toggle.setColors({ trackOn: "red", thumb: "black" });
    assert.deepEqual(toggle.getProperty("background"), { r: 255, g: 0, b: 0, a: 1 });
    assert.deepEqual(toggle.getAppearance().accent, { r: 0, g: 0, b: 0, a: 1 });
  });

  test("invalid styles are rejected", () => {
    assert.throws(
      () => setup({ style: { duration: -1 } }),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_CONFIG"),
    );
  });
});
