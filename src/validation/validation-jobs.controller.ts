import {
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { RolesGuard } from '../roles/roles.guard';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { ValidationService } from './validation.service';
import { ValidationJobResponseDto } from './dto/validation-job-response.dto';

@ApiTags('Validation')
@Controller({ path: 'validation-jobs', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
@ApiForbiddenResponse({ description: 'Role not allowed' })
export class ValidationJobsController {
  constructor(private readonly validationService: ValidationService) {}

  @Get(':id')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Job status, attempts and last error' })
  @ApiOkResponse({ type: ValidationJobResponseDto })
  @ApiNotFoundResponse({ description: 'Job not found' })
  get(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ValidationJobResponseDto> {
    return this.validationService.getJob(id);
  }
}
