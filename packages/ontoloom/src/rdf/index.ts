export {
  blankNodeTerm,
  decodeRDFTerm,
  encodeRDFTerm,
  iriTerm,
  literalTerm,
  type RDFTerm,
  rdfTermFromLiteral,
  rdfTermToLiteral,
} from "./term";
