export default `# CheckVault Lookup Service

Indexes the committed event journal of a CheckVault and answers queries over it.

Every journal entry carries a sequence number (starting at 1) and an id, the sha256 of the
sequence number and the JSON payload. Item ids and amounts are decimal strings.

## Event kinds

- **deposit**: an item moved into custody; \`account\` (the prior custodian) was credited.
- **redeem**: an item left custody; \`account\` was debited its current value.
- **merge**: \`burnId\` was merged into \`keepId\`, which now has \`rank\`.
- **aggregate**: 64 rank-6 items became one rank-7 item, \`survivorId\`.
- **transfer**: fungible units moved; \`spender\` is set when an allowance was used.
- **approval**: an allowance was set.

## Query fields

All fields are optional. Without a filter, every event is returned.

- \`account\`: events touching this identity (hex public key)
- \`itemId\`: events touching this item
- \`kind\`: one of the kinds above
- \`sinceSequence\`: only events after this sequence number
- \`sequence\`: the single event with this sequence number; every other field is ignored
- \`limit\` (default 50), \`skip\` (default 0), \`sortOrder\` ('asc' or 'desc', by sequence, default 'desc')

## Example

\`\`\`json
{ "service": "ls_checkvault", "query": { "itemId": "42", "sortOrder": "asc" } }
\`\`\``
