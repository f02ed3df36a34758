import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {InvalidRequestError} from '../../errors.js'
import {loadInvocationRequest, parseInvocationRequest} from '../request.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('parseInvocationRequest accepts a complete request', t => {
  const request = parseInvocationRequest({
    tool: 'samtools-sort',
    image: 'biocontainers/samtools:1.19',
    args: ['samtools', 'sort', '-o', {kind: 'output', template: 'sorted.bam'}, {kind: 'input', path: '/data/reads.bam', mutable: false}],
    outputs: ['sorted.bam', {template: 'stats.txt', optional: true}],
    workdir: '/tmp'
  })

  t.deepEqual(request, {
    tool: 'samtools-sort',
    image: 'biocontainers/samtools:1.19',
    args: [
      'samtools', 'sort', '-o',
      {kind: 'output', template: 'sorted.bam'},
      {kind: 'input', path: '/data/reads.bam', mutable: false, resolveParent: undefined}
    ],
    outputs: [{template: 'sorted.bam'}, {template: 'stats.txt', optional: true}],
    workdir: '/tmp'
  })
})

test('relative input paths resolve against the base directory', t => {
  const request = parseInvocationRequest({
    tool: 'wc',
    image: 'alpine:3.20',
    args: ['wc', {kind: 'input', path: 'data/in.txt'}]
  }, '/work')

  t.deepEqual(request.args[1], {kind: 'input', path: '/work/data/in.txt', mutable: undefined, resolveParent: undefined})
})

test('parseInvocationRequest rejects malformed requests', t => {
  const valid = {tool: 'wc', image: 'alpine:3.20', args: ['wc']}
  const invalid: unknown[] = [
    null,
    [],
    {...valid, tool: ''},
    {...valid, image: 42},
    {...valid, args: []},
    {...valid, args: 'wc -l'},
    {...valid, args: [{kind: 'input', path: '/in'}]},
    {...valid, args: ['wc', {kind: 'other'}]},
    {...valid, args: ['wc', {kind: 'input'}]},
    {...valid, args: ['wc', {kind: 'input', path: '/in', mutable: 'yes'}]},
    {...valid, outputs: 'out.txt'},
    {...valid, outputs: [{optional: true}]},
    {...valid, workdir: 'relative'}
  ]

  for (const raw of invalid) {
    t.throws(() => parseInvocationRequest(raw), {instanceOf: InvalidRequestError}, JSON.stringify(raw))
  }
})

test('tool names are free-form', t => {
  const request = parseInvocationRequest({tool: 'FSL BET', image: 'fsl:6.0', args: ['bet']})
  t.is(request.tool, 'FSL BET')
})

test('loadInvocationRequest reads YAML next to its data', async t => {
  const root = await createTmpDir()
  const file = join(root, 'request.yaml')
  await writeFile(file, [
    'tool: wc',
    'image: alpine:3.20',
    'args:',
    '  - wc',
    '  - -l',
    '  - {kind: input, path: in.txt}',
    ''
  ].join('\n'))

  const request = await loadInvocationRequest(file)
  t.deepEqual(request.args, ['wc', '-l', {kind: 'input', path: join(root, 'in.txt'), mutable: undefined, resolveParent: undefined}])
})
