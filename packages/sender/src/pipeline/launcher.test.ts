import { describe, it, expect } from 'vitest'
import { launchPipeline } from './launcher.js'
import { ProcessSupervisor } from '../services/process-supervisor.js'
import { FakeHost } from '../test-utils.js'
import { ProcessSpawnError } from '../utils/errors.js'

const command = { command: 'gst-launch-1.0', args: ['-e', 'videotestsrc'], inheritedFds: [9] }

describe('launchPipeline', () => {
  it('should spawn the pipeline with inherited descriptors and return its exit status', async () => {
    const host = new FakeHost().onSpawn('gst-launch-1.0', (process) => setImmediate(() => process.exit(0)))
    const supervisor = new ProcessSupervisor()

    const status = await launchPipeline(command, { host, supervisor, env: { WAYLAND_DISPLAY: 'wayland-9' } })

    expect(status).toBe(0)
    expect(host.spawned).toHaveLength(1)
    expect(host.spawned[0].args).toEqual(['-e', 'videotestsrc'])
    expect(host.spawned[0].options).toEqual({ env: { WAYLAND_DISPLAY: 'wayland-9' }, inheritedFds: [9] })
  })

  it('should register the pipeline so shutdown can stop it', async () => {
    const host = new FakeHost().onSpawn('gst-launch-1.0', (process) => setImmediate(() => process.exit(3)))
    const supervisor = new ProcessSupervisor()

    await expect(launchPipeline(command, { host, supervisor })).resolves.toBe(3)
    expect(supervisor.list().map((p) => p.name)).toEqual(['gst-launch-1.0'])
  })

  it('should map a fatal signal to 128 + signal number', async () => {
    const host = new FakeHost().onSpawn('gst-launch-1.0', (process) => setImmediate(() => process.exit(null, 'SIGTERM')))

    await expect(launchPipeline(command, { host, supervisor: new ProcessSupervisor() })).resolves.toBe(143)
  })

  it('should surface a missing pipeline binary as ProcessSpawnError', async () => {
    const host = new FakeHost().failSpawn('gst-launch-1.0')
    const supervisor = new ProcessSupervisor()

    await expect(launchPipeline(command, { host, supervisor })).rejects.toBeInstanceOf(ProcessSpawnError)
    expect(supervisor.size).toBe(0)
  })
})
