import { calculateHashes } from "../../crypto";
import type { HashAlgorithm } from "../../crypto";
import { EncodingError } from "../../errors";
import type { ArtifactMap, LinkMetadata, TargetDescription } from "./link_metadata";

/**
 * Assembles a `LinkMetadata`. Every method returns a new builder.
 *
 * @example
 * ```typescript
 * const link = new LinkMetadataBuilder()
 *   .name('build')
 *   .addProductFromBytes('out.bin', artifactBytes)
 *   .build();
 * ```
 */
export class LinkMetadataBuilder {
  constructor(private readonly draft: LinkMetadata = {
    name: '',
    materials: {},
    products: {},
    env: {},
    byproducts: {},
  }) { }

  name(name: string): LinkMetadataBuilder {
    return new LinkMetadataBuilder({ ...this.draft, name });
  }

  materials(materials: ArtifactMap): LinkMetadataBuilder {
    return new LinkMetadataBuilder({ ...this.draft, materials: { ...materials } });
  }

  products(products: ArtifactMap): LinkMetadataBuilder {
    return new LinkMetadataBuilder({ ...this.draft, products: { ...products } });
  }

  addMaterial(path: string, description: TargetDescription): LinkMetadataBuilder {
    return this.materials({ ...this.draft.materials, [path]: { ...description } });
  }

  addProduct(path: string, description: TargetDescription): LinkMetadataBuilder {
    return this.products({ ...this.draft.products, [path]: { ...description } });
  }

  /**
   * Records a material by hashing its contents.
   */
  addMaterialFromBytes(path: string, contents: Uint8Array, algorithms: readonly HashAlgorithm[] = ['sha256']): LinkMetadataBuilder {
    return this.addMaterial(path, calculateHashes(contents, algorithms));
  }

  /**
   * Records a product by hashing its contents.
   */
  addProductFromBytes(path: string, contents: Uint8Array, algorithms: readonly HashAlgorithm[] = ['sha256']): LinkMetadataBuilder {
    return this.addProduct(path, calculateHashes(contents, algorithms));
  }

  env(env: Readonly<Record<string, string>>): LinkMetadataBuilder {
    return new LinkMetadataBuilder({ ...this.draft, env: { ...env } });
  }

  byproducts(byproducts: Readonly<Record<string, string>>): LinkMetadataBuilder {
    return new LinkMetadataBuilder({ ...this.draft, byproducts: { ...byproducts } });
  }

  /**
   * @throws EncodingError if no name was set
   */
  build(): LinkMetadata {
    if (this.draft.name.length === 0) {
      throw new EncodingError("Link metadata requires a name");
    }
    return this.draft;
  }
}
