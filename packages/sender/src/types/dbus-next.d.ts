import 'dbus-next'

// Present at runtime but missing from the package's declarations
declare module 'dbus-next' {
  interface MessageBus {
    /** Unique bus name (":1.42"), null until the Hello reply arrives */
    readonly name: string | null
  }

  interface SessionBusOptions {
    /** Allow Unix file descriptors in message bodies */
    negotiateUnixFd?: boolean
  }
}
