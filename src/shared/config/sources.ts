import type { SourceDescriptor } from "../../core/entities/source";

export const SOURCES: readonly SourceDescriptor[] = Object.freeze([
  {
    name: "marca_portada",
    kind: "feed",
    url: "https://e00-marca.uecdn.es/rss/portada.xml",
  },
  {
    name: "dazn_news",
    kind: "listing",
    url: "https://www.dazn.com/es-ES/news",
  },
  {
    name: "eurosport_mma",
    kind: "listing",
    url: "https://www.eurosport.es/mma/",
  },
  {
    name: "eurosport_ufc",
    kind: "listing",
    url: "https://www.eurosport.es/mma/ufc/",
  },
]);
