/**
 * Site Setting Admin
 *
 * Key/value configuration. Gated by global grants ("view", "change")
 * rather than grants on its own content type.
 */

import type { ModelAdapter } from "@adminforge/contracts";
import { ModelDescriptor } from "@adminforge/platform";

export class SiteSettingAdmin extends ModelDescriptor {
  constructor(adapter: ModelAdapter) {
    super({
      adapter,
      model: "SiteSetting",
      appLabel: "config",
      label: "Site setting",
      listDisplay: ["key", "value"],
      searchFields: ["key"],
      ordering: ["key"],
      permissionScope: "global",
      withoutDeleteSelected: true,
    });
  }
}
