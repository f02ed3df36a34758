import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {InvalidConfigError} from '../../errors.js'
import {collect, parseAssignments, resolveCliOptions, type GlobalOptions} from '../utils.js'
import {createTmpDir} from '../../__tests__/helpers.js'

function globals(overrides: Partial<GlobalOptions> = {}): GlobalOptions {
  return {config: '/nonexistent/podrun.yaml', imageOverride: [], env: [], ...overrides}
}

test('collect accumulates repeated options', t => {
  t.deepEqual(collect('b', collect('a', [])), ['a', 'b'])
})

test('parseAssignments splits on the first equals sign', t => {
  t.deepEqual(parseAssignments(['A=1', 'B=x=y', 'C='], '--env'), {A: '1', B: 'x=y', C: ''})
})

test('parseAssignments rejects pairs without a key', t => {
  const error = t.throws(() => parseAssignments(['=1'], '--env'), {instanceOf: InvalidConfigError})
  t.is(error?.message, '--env expects KEY=VALUE, got \'=1\'')
  t.throws(() => parseAssignments(['novalue'], '--image-override'), {instanceOf: InvalidConfigError})
})

test('environment variables are the last fallback', async t => {
  const options = await resolveCliOptions(globals(), {PODRUN_ENGINE_PATH: '/opt/apptainer', PODRUN_DATA_DIR: '/scratch'})
  t.is(options.engineExecutablePath, '/opt/apptainer')
  t.is(options.dataDir, '/scratch')
  t.deepEqual(options.imageOverrides, {})
  t.deepEqual(options.environ, {})
})

test('flags win over the configuration file', async t => {
  const root = await createTmpDir()
  const config = join(root, 'podrun.yaml')
  await writeFile(config, [
    'engineExecutablePath: /usr/bin/podman',
    'dataDir: out',
    'imageOverrides:',
    '  "a:1": "b:1"',
    '  "c:1": "d:1"',
    'environ:',
    '  TZ: UTC',
    ''
  ].join('\n'))

  const options = await resolveCliOptions(globals({
    config,
    enginePath: '/usr/local/bin/podman',
    imageOverride: ['a:1=e:1'],
    env: ['LANG=C']
  }), {PODRUN_DATA_DIR: '/ignored'})

  t.is(options.engineExecutablePath, '/usr/local/bin/podman')
  t.is(options.dataDir, join(root, 'out'))
  t.deepEqual(options.imageOverrides, {'a:1': 'e:1', 'c:1': 'd:1'})
  t.deepEqual(options.environ, {TZ: 'UTC', LANG: 'C'})
})
