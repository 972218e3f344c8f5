import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import {
  Actor,
  AdjustLoyaltyPointsDto,
  CreateUserDto,
  UpdateUserDto,
  UserQueryDto,
} from '@app/common';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Post()
  async create(@Body() dto: CreateUserDto, @Actor() actorId?: string) {
    return this.usersService.create(dto, actorId);
  }

  @Get()
  async findAll(@Query() query: UserQueryDto) {
    return this.usersService.findAll(query);
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.usersService.findOne(id);
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateUserDto,
    @Actor() actorId?: string,
  ) {
    return this.usersService.update(id, dto, actorId);
  }

  @Post(':id/loyalty-points')
  async adjustLoyaltyPoints(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AdjustLoyaltyPointsDto,
    @Actor() actorId?: string,
  ) {
    return this.usersService.adjustLoyaltyPoints(id, dto, actorId);
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @Actor() actorId?: string,
  ) {
    await this.usersService.remove(id, actorId);
  }
}
