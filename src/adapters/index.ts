/**
 * Adapter barrel file.
 *
 * Import every adapter here so it registers itself in the global registry
 * at module load time. The order does not matter.
 */

import "./aqs/adapter";
import "./envista/adapter";
