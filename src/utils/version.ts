/**
 * Version information shown in the banner and by --version
 */

export const VERSION = '1.0.0'

export const PRODUCT_NAME = 'portprobe'

export const PRODUCT_DESCRIPTION = 'TCP connect scanner'
