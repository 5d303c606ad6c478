import { LibraryErrors } from "@marginalia/core-platform";
import type { BookMetadata } from "@marginalia/library-store";
import { attr, childElements, findFirst, getText, parseXml, type XmlNode } from "./xml";
import { ZipArchive, normalizeEntryPath } from "./zip";

const CONTAINER_PATH = "META-INF/container.xml";

interface ManifestItem {
  id: string;
  href: string;
  mediaType?: string;
  properties: string[];
}

/**
 * Reads title, first creator, cover image and spine length from an EPUB
 * container. `source` only labels errors.
 */
export function readEpubMetadata(data: Uint8Array, source = "epub"): BookMetadata {
  const archive = new ZipArchive(data, source);

  const containerXml = archive.has(CONTAINER_PATH) ? archive.text(CONTAINER_PATH) : undefined;
  if (containerXml === undefined) {
    throw LibraryErrors.parse(`missing ${CONTAINER_PATH}`, { code: "EPUB_CONTAINER_MISSING", source });
  }

  const rootfile = findFirst(parseXml(containerXml), "rootfile");
  const opfPath = attr(rootfile, "full-path");
  if (!opfPath) {
    throw LibraryErrors.parse("container.xml names no package document", { code: "EPUB_OPF_MISSING", source });
  }

  const packageXml = archive.text(opfPath);
  const packageDoc = packageXml ? parseXml(packageXml) : undefined;
  if (!packageDoc) {
    throw LibraryErrors.parse(`cannot read package document ${opfPath}`, { code: "EPUB_OPF_UNREADABLE", source });
  }

  const metadataNode = findFirst(packageDoc, "metadata");
  const manifest = readManifest(packageDoc, directoryOf(normalizeEntryPath(opfPath)));
  const spine = childElements(findFirst(packageDoc, "spine"), "itemref").filter(ref => attr(ref, "idref"));
  const coverItem = findCoverItem(metadataNode, manifest);

  return {
    title: getText(findFirst(metadataNode, "dc:title")),
    author: getText(findFirst(metadataNode, "dc:creator")),
    coverData: coverItem ? archive.bytes(coverItem.href) : undefined,
    totalPages: spine.length,
  };
}

function readManifest(packageDoc: XmlNode, baseDir: string): Map<string, ManifestItem> {
  const items = new Map<string, ManifestItem>();
  for (const node of childElements(findFirst(packageDoc, "manifest"), "item")) {
    const id = attr(node, "id");
    const href = attr(node, "href");
    if (!id || !href) continue;
    items.set(id, {
      id,
      href: resolveHref(baseDir, href),
      mediaType: attr(node, "media-type"),
      properties: (attr(node, "properties") ?? "").split(/\s+/).filter(Boolean),
    });
  }
  return items;
}

// EPUB 3 flags the cover in the manifest; EPUB 2 points at it from <meta name="cover">.
function findCoverItem(metadataNode: XmlNode | undefined, manifest: Map<string, ManifestItem>) {
  for (const item of manifest.values()) {
    if (item.properties.includes("cover-image")) return item;
  }

  const coverMeta = childElements(metadataNode, "meta").find(meta => attr(meta, "name") === "cover");
  const coverId = attr(coverMeta, "content");
  const item = coverId ? manifest.get(coverId) : undefined;
  if (item && (!item.mediaType || item.mediaType.startsWith("image/"))) {
    return item;
  }
  return undefined;
}

function directoryOf(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash < 0 ? "" : path.slice(0, slash);
}

function resolveHref(baseDir: string, href: string): string {
  const withoutFragment = decodeURIComponentSafe(href.split("#")[0].split("?")[0]);
  const joined = baseDir ? `${baseDir}/${withoutFragment}` : withoutFragment;
  const segments: string[] = [];
  for (const segment of joined.split("/")) {
    if (!segment || segment === ".") continue;
    if (segment === "..") {
      segments.pop();
    } else {
      segments.push(segment);
    }
  }
  return segments.join("/");
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
