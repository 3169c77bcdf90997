export default `# Issuance Index

Keeps one record per successful mint of a gated sale. Failed mints change
nothing in the sale and are not recorded.

Each record carries the buyer class ('whitelist' for presale mints with an
allowlist proof, 'public' for open mints), the buyer address, the quantity,
the issued asset ids, the attached and required payment as decimal strings,
and the treasury that received the payment.

## Queries

- **buyer**: hex address; only mints by this buyer.
- **kind**: 'whitelist' or 'public'.
- **limit** / **skip**: pagination, 50 records by default.
- **sortOrder**: 'desc' (newest first, the default) or 'asc'.

An empty query returns every record.`
