import Handlebars from 'handlebars'
import fs from 'fs-extra'
import path from 'path'
import { config } from '../config/config.js'
import { logger } from './loggers.js'
import { getErrorMessage } from '../services/errors.js'

// Scripts and chemistry inputs are plain text, never HTML
const handlebars = Handlebars.create()

const readTemplate = async (
  templateName: string,
  templateDir: string = config.templateDir
): Promise<string> => {
  try {
    const templateFile = path.join(templateDir, `${templateName}.handlebars`)
    return await fs.readFile(templateFile, 'utf8')
  } catch (error) {
    logger.error(`Error in readTemplate for ${templateName}: ${getErrorMessage(error)}`)
    throw error
  }
}

const registerPartial = async (
  partialName: string,
  templateName: string,
  templateDir?: string
): Promise<void> => {
  const content = await readTemplate(templateName, templateDir)
  handlebars.registerPartial(partialName, content)
}

const renderTemplate = async (
  templateName: string,
  context: object,
  templateDir?: string
): Promise<string> => {
  const content = await readTemplate(templateName, templateDir)
  const templ = handlebars.compile(content, { noEscape: true })
  return templ(context)
}

export { readTemplate, registerPartial, renderTemplate }
