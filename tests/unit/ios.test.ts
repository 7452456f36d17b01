import fs from 'fs';
import os from 'os';
import { IosDriver, lookupScreen } from '../../src/devices/ios';
import screenTable from '../../src/devices/ios-screens.json';
import {
  Device,
  SubprocessError,
  ToolNotInstalledError,
  UnsupportedHostError,
  UnsupportedOperationError,
  ValidationError,
} from '../../src/types';
import { CommandResult, CommandRunner } from '../../src/utils/runner';
import { BOOTED_SIMULATOR, FakeRunner, mockScreenshotData, mockSimctlDevicesOutput } from '../mocks/runner.mock';

const simulator: Device = {
  id: BOOTED_SIMULATOR,
  display_name: 'iPhone 15 Pro (iOS 17.2)',
  platform: 'ios',
  kind: 'simulator',
  state: 'booted',
  model: 'iPhone 15 Pro',
};

const PHYSICAL_UDID = '00008030-001A2B3C4D5E802E';

const physical: Device = {
  id: PHYSICAL_UDID,
  display_name: 'iOS device (00008030)',
  platform: 'ios',
  kind: 'physical',
  state: 'connected',
};

const IO = `xcrun simctl io ${BOOTED_SIMULATOR}`;
const LIST = 'xcrun simctl list devices available --json';

function createDriver(runner: CommandRunner, installTimeoutMs?: number) {
  return new IosDriver(runner, { hostPlatform: 'darwin', installTimeoutMs });
}

describe('IosDriver', () => {
  describe('listDevices', () => {
    it('should list simulators and physical devices', async () => {
      const runner = new FakeRunner({ [LIST]: mockSimctlDevicesOutput, 'idevice_id -l': `${PHYSICAL_UDID}\n` });

      const devices = await createDriver(runner).listDevices();

      expect(devices.map(device => [device.id, device.kind, device.state])).toEqual([
        [BOOTED_SIMULATOR, 'simulator', 'booted'],
        ['66666666-7777-8888-9999-AAAAAAAAAAAA', 'simulator', 'shutdown'],
        [PHYSICAL_UDID, 'physical', 'connected'],
      ]);
    });

    it('should skip physical devices when libimobiledevice is missing', async () => {
      const runner = new FakeRunner({
        [LIST]: mockSimctlDevicesOutput,
        'idevice_id -l': new ToolNotInstalledError('idevice_id', 'Install libimobiledevice'),
      });

      const devices = await createDriver(runner).listDevices();

      expect(devices).toHaveLength(2);
    });

    it('should refuse to list devices off a macOS host', async () => {
      const runner = new FakeRunner();
      const driver = new IosDriver(runner, { hostPlatform: 'linux' });

      const failure = driver.listDevices();

      await expect(failure).rejects.toThrow(UnsupportedHostError);
      await expect(failure).rejects.toThrow('iOS devices can only be reached from a macOS host (this host: linux)');
      await expect(failure).rejects.toMatchObject({ kind: 'platform_unsupported' });
      expect(runner.commands()).toEqual([]);
    });

    it('should report a failing simctl', async () => {
      const runner = new FakeRunner({
        [LIST]: { stderr: 'xcrun: error: unable to find utility "simctl"', exitCode: 72 },
      });

      await expect(createDriver(runner).listDevices()).rejects.toThrow(
        `${LIST} failed: xcrun: error: unable to find utility "simctl"`
      );
    });
  });

  describe('capabilities', () => {
    const driver = createDriver(new FakeRunner());

    it('should leave orientation queries and element listing out for simulators', () => {
      expect(driver.supports('simulator', 'click_on_screen_at_coordinates')).toBe(true);
      expect(driver.supports('simulator', 'get_orientation')).toBe(false);
      expect(driver.supports('simulator', 'list_elements_on_screen')).toBe(false);
    });

    it('should only capture screenshots on physical devices', () => {
      expect(driver.supports('physical', 'take_screenshot')).toBe(true);
      expect(driver.supports('physical', 'save_screenshot')).toBe(true);
      expect(driver.supports('physical', 'launch_app')).toBe(false);
    });

    it('should ask for a shut-down simulator to be booted', () => {
      expect(driver.unavailableReason(simulator)).toBeUndefined();
      expect(driver.unavailableReason({ ...simulator, state: 'shutdown' })).toBe(
        `Boot the simulator first (xcrun simctl boot ${BOOTED_SIMULATOR})`
      );
    });
  });

  describe('screen', () => {
    it('should capture simulator screenshots through simctl', async () => {
      const runner = new FakeRunner({ [`${IO} screenshot --type=png -`]: mockScreenshotData });

      const png = await createDriver(runner).screenshot(simulator);

      expect(png.equals(mockScreenshotData)).toBe(true);
    });

    it('should capture physical screenshots through idevicescreenshot', async () => {
      const commands: string[][] = [];
      const runner: CommandRunner = {
        async run(file: string, args: string[]): Promise<CommandResult> {
          commands.push([file, ...args]);
          fs.writeFileSync(args[2], mockScreenshotData);
          return { stdout: Buffer.alloc(0), stderr: '', exitCode: 0 };
        },
      };

      const png = await createDriver(runner).screenshot(physical);

      expect(png.equals(mockScreenshotData)).toBe(true);
      expect(commands).toHaveLength(1);
      expect(commands[0].slice(0, 3)).toEqual(['idevicescreenshot', '-u', PHYSICAL_UDID]);
      expect(fs.existsSync(commands[0][3])).toBe(false);
    });

    it('should estimate the screen size from the model table', async () => {
      const size = await createDriver(new FakeRunner()).screenSize(simulator);

      expect(size).toEqual({
        width: 1179,
        height: 2556,
        estimated: { points: { width: 393, height: 852 }, scale: 3, model: 'iPhone 15 Pro' },
      });
    });

    it('should match specific models before their shorter prefixes', () => {
      expect(lookupScreen('iPhone 15 Pro Max').model).toBe('iPhone 15 Pro Max');
      expect(lookupScreen('iPad mini (6th generation)').points).toEqual({ width: 744, height: 1133 });
    });

    it.each([
      ['iPhone 13 Pro Max', 'iPhone 13 Pro Max', 428, 926, 3],
      ['iPhone 13 Pro', 'iPhone 13 Pro', 390, 844, 3],
      ['iPhone 12 mini', 'iPhone 12 mini', 375, 812, 3],
      ['iPhone 12 Pro Max', 'iPhone 12 Pro Max', 428, 926, 3],
      ['iPhone 11 Pro', 'iPhone 11 Pro', 375, 812, 3],
      ['iPhone 11', 'iPhone 11', 414, 896, 2],
    ])('should size %s from its own entry', (model, entry, width, height, scale) => {
      expect(lookupScreen(model)).toEqual({ points: { width, height }, scale, model: entry });
    });

    it('should keep every table entry reachable', () => {
      const matches = screenTable.models.map(entry => entry.match);

      for (const [index, match] of matches.entries()) {
        expect(lookupScreen(match).model).toBe(match);
        expect(matches.slice(0, index).filter(earlier => match.includes(earlier))).toEqual([]);
      }
    });

    it('should fall back to the default size for unknown models', () => {
      expect(lookupScreen('Apple Vision Pro')).toEqual({
        points: { width: 390, height: 844 },
        scale: 3,
        model: 'default',
      });
    });

    it('should not read the orientation', async () => {
      await expect(createDriver(new FakeRunner()).orientation(simulator)).rejects.toThrow(UnsupportedOperationError);
    });

    it('should rotate through simctl', async () => {
      const runner = new FakeRunner({ [`${IO} orientation landscape`]: '' });

      await createDriver(runner).setOrientation(simulator, 'landscape');

      expect(runner.commands()).toEqual([`${IO} orientation landscape`]);
    });
  });

  describe('gestures and input', () => {
    it('should tap at rounded coordinates', async () => {
      const runner = new FakeRunner({ [`${IO} tap 10 21`]: '' });

      await createDriver(runner).tap(simulator, { x: 10.2, y: 20.5 });

      expect(runner.commands()).toEqual([`${IO} tap 10 21`]);
    });

    it('should degrade a long press to a tap and say so', async () => {
      const runner = new FakeRunner({ [`${IO} tap 100 200`]: '' });

      const outcome = await createDriver(runner).longPress(simulator, { x: 100, y: 200 }, 1000);

      expect(outcome).toEqual({
        degraded:
          'performed as a single tap; the iOS simulator has no long press, so the requested 1000ms duration was not honored',
      });
      expect(runner.commands()).toEqual([`${IO} tap 100 200`]);
    });

    it('should swipe without a duration', async () => {
      const runner = new FakeRunner({ [`${IO} swipe 200 800 200 200`]: '' });

      await createDriver(runner).swipe(simulator, { x: 200, y: 800 }, { x: 200, y: 200 });

      expect(runner.commands()).toEqual([`${IO} swipe 200 800 200 200`]);
    });

    it('should type text as a single argument', async () => {
      const runner = new FakeRunner({ [`${IO} type hello world`]: '' });

      await createDriver(runner).typeText(simulator, 'hello world');

      expect(runner.calls).toHaveLength(1);
    });

    it('should map buttons onto simctl names', async () => {
      const runner = new FakeRunner({ [`${IO} press volumeUp`]: '' });

      await createDriver(runner).pressButton(simulator, 'volume_up');

      expect(runner.commands()).toEqual([`${IO} press volumeUp`]);
    });

    it('should refuse buttons the simulator lacks', async () => {
      const runner = new FakeRunner();

      await expect(createDriver(runner).pressButton(simulator, 'back')).rejects.toThrow(
        'press_button back is unsupported on this device kind (ios simulator)'
      );
      expect(runner.commands()).toEqual([]);
    });
  });

  describe('apps', () => {
    it('should convert the listapps plist to JSON before parsing', async () => {
      const plist = '{\n    "com.example.demo" = { CFBundleName = Demo; };\n}';
      const runner = new FakeRunner({
        [`xcrun simctl listapps ${BOOTED_SIMULATOR}`]: plist,
        'plutil -convert json -o - -': JSON.stringify({ 'com.example.demo': { CFBundleName: 'Demo' } }),
      });

      const apps = await createDriver(runner).listApps(simulator);

      expect(apps).toEqual([{ id: 'com.example.demo', name: 'Demo' }]);
      const input = runner.calls[1].options?.input;
      expect(Buffer.isBuffer(input) ? input.toString('utf-8') : input).toBe(plist);
    });

    it('should launch, terminate, uninstall and open URLs through simctl', async () => {
      const runner = new FakeRunner({
        [`xcrun simctl launch ${BOOTED_SIMULATOR} com.example.demo`]: 'com.example.demo: 4242\n',
        [`xcrun simctl terminate ${BOOTED_SIMULATOR} com.example.demo`]: '',
        [`xcrun simctl uninstall ${BOOTED_SIMULATOR} com.example.demo`]: '',
        [`xcrun simctl openurl ${BOOTED_SIMULATOR} myapp://home`]: '',
      });
      const driver = createDriver(runner);

      await driver.launchApp(simulator, 'com.example.demo');
      await driver.terminateApp(simulator, 'com.example.demo');
      await driver.uninstallApp(simulator, 'com.example.demo');
      await driver.openUrl(simulator, 'myapp://home');

      expect(runner.commands()).toHaveLength(4);
    });

    it('should report a failed launch', async () => {
      const command = `xcrun simctl launch ${BOOTED_SIMULATOR} com.example.missing`;
      const runner = new FakeRunner({
        [command]: { stderr: 'An error was encountered processing the command (code=4)', exitCode: 4 },
      });

      const failure = createDriver(runner).launchApp(simulator, 'com.example.missing');

      await expect(failure).rejects.toThrow(SubprocessError);
      await expect(failure).rejects.toThrow(
        `${command} failed: An error was encountered processing the command (code=4)`
      );
    });

    it('should check that the bundle exists before installing', async () => {
      const runner = new FakeRunner();

      await expect(createDriver(runner).installApp(simulator, '/nonexistent/Demo.app')).rejects.toThrow(
        ValidationError
      );
      expect(runner.commands()).toEqual([]);
    });

    it('should install with the install timeout', async () => {
      const bundle = os.tmpdir();
      const command = `xcrun simctl install ${BOOTED_SIMULATOR} ${bundle}`;
      const runner = new FakeRunner({ [command]: '' });

      await createDriver(runner, 120000).installApp(simulator, bundle);

      expect(runner.calls).toEqual([{ command, options: { timeoutMs: 120000 } }]);
    });
  });
});
