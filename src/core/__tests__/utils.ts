import test from 'ava'
import {errorCode, formatDuration, generateId, quote, quoteArg, slugify} from '../utils.js'

test('quoteArg leaves safe words bare', t => {
  t.is(quoteArg('/mnt/in0/in.txt'), '/mnt/in0/in.txt')
  t.is(quoteArg('--userns=keep-id'), '--userns=keep-id')
  t.is(quoteArg('/data:/mnt/in0:ro'), '/data:/mnt/in0:ro')
})

test('quoteArg quotes everything else', t => {
  t.is(quoteArg(''), '\'\'')
  t.is(quoteArg('a b'), '\'a b\'')
  t.is(quoteArg('$HOME'), '\'$HOME\'')
  t.is(quoteArg('it\'s'), '\'it\'"\'"\'s\'')
})

test('quote joins quoted arguments', t => {
  t.is(quote(['sh', '-c', 'wc -l < in.txt']), 'sh -c \'wc -l < in.txt\'')
})

test('generateId: timestamp followed by a short uuid', t => {
  t.regex(generateId(), /^\d+-[\da-f]{8}$/)
  t.not(generateId(), generateId())
})

test('slugify: lowercases and replaces unsafe characters', t => {
  t.is(slugify('Word Count'), 'word-count')
  t.is(slugify('Éléphant/Tool'), 'elephant-tool')
  t.is(slugify('--a  b--'), 'a-b')
  t.is(slugify('bwa.mem_2'), 'bwa.mem_2')
})

test('formatDuration', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('errorCode reads Node.js error codes', t => {
  t.is(errorCode(Object.assign(new Error('missing'), {code: 'ENOENT'})), 'ENOENT')
  t.is(errorCode(new Error('plain')), undefined)
  t.is(errorCode('ENOENT'), undefined)
})
