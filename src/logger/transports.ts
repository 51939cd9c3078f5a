import Transport from 'winston-transport';
import debug from "debug";
import _ from "lodash";

interface LogInfo {
  level: string;
  message: unknown;
  component?: string;
  [key: string]: unknown;
}

/**
 * Prints log entries through `debug`, one namespace per component,
 * so they can be enabled with DEBUG=ads:*
 */
export class DebugTransport extends Transport {
  name = 'debug';
  private readonly defaultFn = debug("ads:log");
  private readonly debugFnMap: Record<string, debug.Debugger> = {};

  private getDebugFn(component?: string): debug.Debugger {
    if (!component) {
      return this.defaultFn;
    }

    const debugLabel = 'ads:' + component;
    let fn = this.debugFnMap[debugLabel];
    if (!fn) {
      fn = debug(debugLabel);
      this.debugFnMap[debugLabel] = fn;
    }
    return fn;
  }

  log(info: LogInfo, callback: () => void): void {
    const {level, message, component, timestamp, hostname, pid, ...meta} = info;
    const fn = this.getDebugFn(component);
    const metaToLog = _.pickBy(meta, function(value, key) {
      return typeof key !== 'symbol';
    });

    if (level === 'error') {
      fn(`[${level}] ${message}`, metaToLog);
    } else {
      fn(`[${level}] ${message}`);
    }

    callback();
  }
}
