import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { headlessBackend } from './index.js'
import type { SenderConfig } from '../../config.js'
import { AndroidSession } from '../../services/android-session.js'
import { ProcessSupervisor } from '../../services/process-supervisor.js'
import { FakeBroker, FakeHost } from '../../test-utils.js'

const registry = [{ id: 64, info: { props: { 'media.class': 'Video/Source', 'node.name': 'weston.pipewire' } } }]

describe('headlessBackend', () => {
  let runtimeDir: string
  let supervisor: ProcessSupervisor

  beforeEach(() => {
    runtimeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'droidcast-headless-'))
    supervisor = new ProcessSupervisor()
  })

  afterEach(async () => {
    await supervisor.shutdownAll()
    fs.rmSync(runtimeDir, { recursive: true, force: true })
  })

  function config(): SenderConfig {
    return {
      receiver: { host: '127.0.0.1', port: 9000 },
      captureMethod: 'headless',
      framerate: 30,
      bitrateKbps: 4000,
      headless: { width: 1280, height: 720, runtimeDir },
      inputRelay: { enabled: false, port: 9001, script: 'input_server.py' },
      app: { packageOverride: 'com.example.empires', namePattern: 'empire' },
      x11Display: ':0',
    }
  }

  it('should start the compositor before Android and discover its node afterwards', async () => {
    const order: string[] = []
    let sessionRunning = true
    const host = new FakeHost()
      .onExec('waydroid', (args) => {
        order.push(`waydroid ${args.join(' ')}`)
        if (args[0] === 'session' && args[1] === 'stop') sessionRunning = false
        if (args[0] === 'status') return { stdout: sessionRunning ? 'Session:\tRUNNING\nAndroid:\tready' : 'Session:\tSTOPPED' }
        return {}
      })
      .onExec('pw-dump', () => {
        order.push('pw-dump')
        return { stdout: JSON.stringify(registry) }
      })
      .onDetached('waydroid', (args) => {
        if (args[0] === 'session' && args[1] === 'start') sessionRunning = true
      })
      .onSpawn('weston', () => {
        order.push('weston')
        fs.writeFileSync(path.join(runtimeDir, 'droidcast-stream'), '')
      })
    const env: NodeJS.ProcessEnv = {}
    const android = new AndroidSession(host, env)

    const source = await headlessBackend.acquire({
      config: config(),
      host,
      supervisor,
      android,
      env,
      connectBroker: async () => new FakeBroker(),
    })

    expect(source.session).toEqual({ backendKind: 'headless', sourceHandle: '64', state: 'acquired' })
    expect(env.WAYLAND_DISPLAY).toBe('droidcast-stream')
    expect(order).toEqual([
      'waydroid status',
      'waydroid session stop',
      'weston',
      'waydroid status',
      'waydroid status',
      'waydroid status',
      'waydroid app launch com.example.empires',
      'pw-dump',
    ])
    expect(host.detached.map((c) => c.args.join(' '))).toEqual(['session start', 'show-full-ui'])
    expect(host.detached[0].env).toBe(env)

    await source.release()
  })
})
