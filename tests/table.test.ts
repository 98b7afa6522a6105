import test from 'node:test'
import assert from 'node:assert/strict'
import { parseTable } from '../src/scrape/table'

test('parseTable keys rows by header text', () => {
  const html = `
    <table class="prices">
      <thead><tr><th> Item </th><th>Unit
        Price</th></tr></thead>
      <tbody>
        <tr><td>Apple</td><td>1.20</td></tr>
        <tr><td>Pear</td><td> 0.90 </td></tr>
      </tbody>
    </table>`
  assert.deepEqual(parseTable(html, 'table.prices'), {
    headers: ['Item', 'Unit Price'],
    rows: [
      { Item: 'Apple', 'Unit Price': '1.20' },
      { Item: 'Pear', 'Unit Price': '0.90' },
    ],
  })
})

test('cells beyond the header width get positional keys', () => {
  const html = '<table><tr><th>A</th></tr><tr><td>1</td><td>2</td><td>3</td></tr></table>'
  assert.deepEqual(parseTable(html)?.rows, [{ A: '1', column_2: '2', column_3: '3' }])
})

test('a table without headers uses positional keys throughout', () => {
  const html = '<table><tr><td>x</td><td>y</td></tr></table>'
  assert.deepEqual(parseTable(html), { headers: [], rows: [{ column_1: 'x', column_2: 'y' }] })
})

test('a row header cell counts as a data cell', () => {
  const html = '<table><tr><th>City</th><th>Pop</th></tr><tr><th>Oslo</th><td>700k</td></tr></table>'
  assert.deepEqual(parseTable(html)?.rows, [{ City: 'Oslo', Pop: '700k' }])
})

test('only the first matching table is parsed', () => {
  const html =
    '<table><tr><th>First</th></tr><tr><td>1</td></tr></table>' +
    '<table><tr><th>Second</th></tr><tr><td>2</td></tr></table>'
  assert.deepEqual(parseTable(html)?.headers, ['First'])
})

test('no match returns null', () => {
  assert.equal(parseTable('<div>nothing</div>', '#missing'), null)
  assert.equal(parseTable('<div id="w">nothing</div>', '#w'), null)
})

test('repeated header names are suffixed instead of overwriting', () => {
  const html = '<table><tr><th>Name</th><th>Name</th><th>Score</th><th>Name</th></tr><tr><td>a</td><td>b</td><td>3</td><td>c</td></tr></table>'
  assert.deepEqual(parseTable(html), {
    headers: ['Name', 'Name_2', 'Score', 'Name_3'],
    rows: [{ Name: 'a', Name_2: 'b', Score: '3', Name_3: 'c' }],
  })
})

test('rows of a nested table stay out of the outer table', () => {
  const html =
    '<table id="outer"><tr><th>Item</th><th>Parts</th></tr>' +
    '<tr><td>Kit</td><td><table><tr><td>bolt</td></tr></table></td></tr>' +
    '</table>'
  assert.deepEqual(parseTable(html, '#outer')?.rows, [{ Item: 'Kit', Parts: 'bolt' }])
})

test('a wrapper selector parses the first table inside it', () => {
  const html = '<div class="report"><table><tr><th>K</th></tr><tr><td>v</td></tr></table></div>'
  assert.deepEqual(parseTable(html, '.report')?.rows, [{ K: 'v' }])
})
