// src/gpio.ts
import { Gpio } from "onoff";
import { createLog } from "./log";
import type { InputLine } from "./buttons";

const log = createLog("gpio");

/** Input line backed by sysfs GPIO: pulled-up button, falling edge. */
export function openGpioLine(id: number): InputLine {
  if (!Gpio.accessible) throw new Error("GPIO is not accessible on this system");

  const gpio = new Gpio(id, "in", "falling", { debounceTimeout: 10 });
  return {
    id,
    watch(onEdge) {
      gpio.watch((err) => {
        if (err) {
          log.warn(`line ${id} read error:`, err.message);
          return;
        }
        onEdge();
      });
    },
    release() {
      gpio.unwatchAll();
      gpio.unexport();
    },
  };
}

export function openOutputLine(id: number): Gpio {
  if (!Gpio.accessible) throw new Error("GPIO is not accessible on this system");
  return new Gpio(id, "out");
}
