// Discriminated union of every concrete artifact

import { PRD } from './prd.js';
import { DAA } from './daa.js';
import { TIP } from './tip.js';
import { RFC } from './rfc.js';
import { ADR } from './adr.js';
import { Bolt } from './bolt.js';
import { Postmortem } from './postmortem.js';

export type AnyArtifact = PRD | DAA | TIP | RFC | ADR | Bolt | Postmortem;
