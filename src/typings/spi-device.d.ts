// spi-device ships no type declarations; only the calls used here are declared.
declare module "spi-device" {
  export type SpiOptions = {
    mode?: number;
    maxSpeedHz?: number;
    noChipSelect?: boolean;
  };

  export type SpiMessage = {
    sendBuffer?: Buffer;
    receiveBuffer?: Buffer;
    byteLength: number;
    speedHz?: number;
  };

  export interface SpiDevice {
    transfer(messages: SpiMessage[], cb: (err: Error | null, messages: SpiMessage[]) => void): SpiDevice;
    close(cb: (err: Error | null) => void): SpiDevice;
  }

  export function open(busNumber: number, deviceNumber: number, options: SpiOptions, cb: (err: Error | null) => void): SpiDevice;
}
