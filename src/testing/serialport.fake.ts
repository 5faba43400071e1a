import { EventEmitter } from 'events';

type Callback = (err: Error | null) => void;

export interface FakeSerialPortOptions {
  path: string;
  baudRate: number;
  autoOpen?: boolean;
}

/**
 * Stand-in for serialport's `SerialPort`, loaded through `vi.mock`. A failed
 * write reaches the write callback and is then emitted as a stream `'error'`,
 * the way the real stream reports an unplugged device.
 */
export class SerialPort extends EventEmitter {
  static instances: SerialPort[] = [];
  static failWritesWith: Error | null = null;
  static failOpenWith: Error | null = null;

  readonly path: string;
  readonly written: Buffer[] = [];
  isOpen = false;

  constructor(options: FakeSerialPortOptions) {
    super();
    this.path = options.path;
    SerialPort.instances.push(this);
  }

  static reset(): void {
    SerialPort.instances = [];
    SerialPort.failWritesWith = null;
    SerialPort.failOpenWith = null;
  }

  static async list(): Promise<{ path: string }[]> {
    return SerialPort.instances.map((port) => ({ path: port.path }));
  }

  open(callback: Callback): void {
    const err = SerialPort.failOpenWith;
    process.nextTick(() => {
      if (!err) this.isOpen = true;
      callback(err);
    });
  }

  write(data: Buffer, callback: Callback): boolean {
    const err = SerialPort.failWritesWith;
    process.nextTick(() => {
      if (err) {
        callback(err);
        this.emit('error', err);
        return;
      }
      this.written.push(data);
      callback(null);
    });
    return true;
  }

  drain(callback: Callback): void {
    process.nextTick(() => callback(null));
  }

  close(callback: Callback): void {
    process.nextTick(() => {
      this.isOpen = false;
      callback(null);
      this.emit('close');
    });
  }
}
