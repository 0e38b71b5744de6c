import { afterEach, beforeEach } from "vitest";
import { getAllSettings } from "../../src/config/userConfig.js";

/**
 * Clears every environment variable the configuration loader reads before each test in the calling suite, and puts the original values back afterwards. Tests
 * can then set process.env entries directly.
 * @param extra - Additional variable names to isolate.
 */
export function isolateConfigEnv(extra: string[] = []): void {

  const names = [ ...getAllSettings().flatMap((setting) => setting.envVar ? [setting.envVar] : []), ...extra ];
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {

    for(const name of names) {

      saved.set(name, process.env[name]);

      delete process.env[name];
    }
  });

  afterEach(() => {

    for(const [ name, value ] of saved) {

      if(value === undefined) {

        delete process.env[name];
      } else {

        process.env[name] = value;
      }
    }
  });
}
