/**
 * Operator Notifications
 *
 * Best-effort delivery of a title and message. Implementations are tried in
 * priority order by NotifierChain:
 * - DesktopNotifier: platform toast (notify-send, osascript, PowerShell)
 * - SoundNotifier: terminal bell
 * - LogNotifier: event log stream, always available
 *
 * The orchestrator only ever sees the Notifier interface.
 */

import type { Logger } from '../logger'
import type { ProcessRunner } from '../sync/robocopy'

export type NotificationLevel = 'info' | 'warning' | 'error'

export interface Notification {
  /** @example 'Mirror completed' */
  title: string
  /** @example '2 destination(s) mirrored' */
  message: string
  level: NotificationLevel
}

export interface Notifier {
  readonly name: string
  notify(notification: Notification): Promise<void>
}

/**
 * Tries each notifier in order and stops at the first that succeeds.
 * Never rejects: failures are logged at debug level and dropped.
 */
export class NotifierChain implements Notifier {
  readonly name = 'chain'
  private notifiers: readonly Notifier[]
  private log: Logger

  constructor(notifiers: readonly Notifier[], logger: Logger) {
    this.notifiers = notifiers
    this.log = logger.child({ component: 'NotifierChain' })
  }

  async notify(notification: Notification): Promise<void> {
    for (const notifier of this.notifiers) {
      try {
        await notifier.notify(notification)
        return
      } catch (err) {
        this.log.debug(
          { notifier: notifier.name, err },
          `Notifier ${notifier.name} failed, trying next`,
        )
      }
    }
    this.log.debug({ title: notification.title }, 'No notifier delivered the notification')
  }
}

/**
 * Desktop toast through the platform's notification command.
 */
export class DesktopNotifier implements Notifier {
  readonly name = 'desktop'
  private runner: ProcessRunner
  private platform: NodeJS.Platform

  constructor(runner: ProcessRunner, platform: NodeJS.Platform = process.platform) {
    this.runner = runner
    this.platform = platform
  }

  async notify(notification: Notification): Promise<void> {
    const [command, args] = desktopCommand(this.platform, notification)
    const exitCode = await this.runner.run(command, args)
    if (exitCode !== 0) {
      throw new Error(`${command} exited with code ${exitCode}`)
    }
  }
}

function escapeAppleScript(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
}

function escapePowerShell(text: string): string {
  return text.replace(/'/g, "''")
}

/**
 * Command and argument vector that shows `notification` on `platform`.
 */
export function desktopCommand(
  platform: NodeJS.Platform,
  notification: Notification,
): [command: string, args: string[]] {
  const { title, message, level } = notification

  switch (platform) {
    case 'darwin':
      return [
        'osascript',
        [
          '-e',
          `display notification "${escapeAppleScript(message)}" with title "${escapeAppleScript(title)}"`,
        ],
      ]
    case 'win32': {
      const icon = level === 'error' ? 'Error' : level === 'warning' ? 'Warning' : 'Info'
      const script = [
        'Add-Type -AssemblyName System.Windows.Forms',
        '$n = New-Object System.Windows.Forms.NotifyIcon',
        '$n.Icon = [System.Drawing.SystemIcons]::Information',
        '$n.Visible = $true',
        `$n.ShowBalloonTip(10000, '${escapePowerShell(title)}', '${escapePowerShell(message)}', [System.Windows.Forms.ToolTipIcon]::${icon})`,
        'Start-Sleep -Seconds 5',
        '$n.Dispose()',
      ].join('; ')
      return ['powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', script]]
    }
    default:
      return [
        'notify-send',
        ['--urgency', level === 'error' ? 'critical' : 'normal', '--app-name', 'fanmirror', title, message],
      ]
  }
}

/** The part of a tty stream the bell needs. */
export interface BellStream {
  isTTY?: boolean
  write(chunk: string): boolean
}

/**
 * Terminal bell. Only works when the stream is a terminal.
 */
export class SoundNotifier implements Notifier {
  readonly name = 'sound'
  private stream: BellStream

  constructor(stream: BellStream = process.stderr) {
    this.stream = stream
  }

  async notify(): Promise<void> {
    if (!this.stream.isTTY) {
      throw new Error('Output is not a terminal')
    }
    this.stream.write('\u0007')
  }
}

/**
 * Writes the notification to the event log stream.
 */
export class LogNotifier implements Notifier {
  readonly name = 'log'
  private log: Logger

  constructor(logger: Logger) {
    this.log = logger.child({ component: 'Notification' })
  }

  async notify(notification: Notification): Promise<void> {
    const line = `${notification.title}: ${notification.message}`
    switch (notification.level) {
      case 'error':
        this.log.error(line)
        break
      case 'warning':
        this.log.warn(line)
        break
      case 'info':
        this.log.info(line)
        break
    }
  }
}

/**
 * Discards everything. Used for --no-notify.
 */
export class SilentNotifier implements Notifier {
  readonly name = 'silent'

  async notify(): Promise<void> {}
}

/**
 * Default chain: desktop toast, then terminal bell, then the event log.
 */
export function createDefaultNotifier(runner: ProcessRunner, logger: Logger): Notifier {
  return new NotifierChain(
    [new DesktopNotifier(runner), new SoundNotifier(), new LogNotifier(logger)],
    logger,
  )
}
