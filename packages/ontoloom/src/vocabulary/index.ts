export {
  DEFAULT_PREFIXES,
  OWL,
  OWL_NAMESPACE,
  RDF,
  RDF_NAMESPACE,
  RDFS,
  RDFS_NAMESPACE,
  STANDARD_PREFIXES,
  XSD_NAMESPACE,
} from "./namespaces";
export { PrefixMap } from "./prefix-map";
